import { createLogger } from "../logger.js";
import { isJsonObject, type BuildOutcome, type JsonValue, type MindmapDocument, type MindmapNode } from "./model.js";

const logger = createLogger("search");

export interface SearchCriteria {
    titleContains?: string;
    caseSensitive?: boolean;
    attributeEquals?: {
        key: string;
        value: JsonValue;
    };
    maxDepth?: number;
    // Consumed by the Drive listing before documents reach the engine.
    folderScope?: string;
}

export interface PathStep {
    id: string;
    title: string;
}

export interface MatchResult {
    sourceId: string;
    node: MindmapNode;
    pathFromRoot: readonly PathStep[];
}

export type DocumentSearchResult =
    | { sourceId: string; ok: true; matches: MatchResult[] }
    | { sourceId: string; ok: false; error: unknown };

type NodePredicate = (node: MindmapNode) => boolean;

function compile(criteria: SearchCriteria): NodePredicate[] {
    const predicates: NodePredicate[] = [];

    if (criteria.titleContains !== undefined) {
        const caseSensitive = criteria.caseSensitive ?? false;
        const query = caseSensitive ? criteria.titleContains : criteria.titleContains.toLowerCase();
        predicates.push(node => {
            const title = caseSensitive ? node.title : node.title.toLowerCase();
            return title.includes(query);
        });
    }

    if (criteria.attributeEquals !== undefined) {
        const { key, value } = criteria.attributeEquals;
        predicates.push(node =>
            Object.prototype.hasOwnProperty.call(node.attributes, key) && jsonEquals(node.attributes[key], value)
        );
    }

    return predicates;
}

/**
 * Visits each document pre-order and returns the nodes meeting every given
 * criterion, in document order. Without criteria every node matches. Nodes
 * below `maxDepth` are not visited.
 */
export function search(documents: readonly MindmapDocument[], criteria: SearchCriteria = {}): MatchResult[] {
    const predicates = compile(criteria);
    const matches: MatchResult[] = [];

    for (const document of documents) {
        const stack: Array<{ node: MindmapNode; path: readonly PathStep[] }> = [
            { node: document.root, path: Object.freeze([]) },
        ];
        while (stack.length > 0) {
            const next = stack.pop();
            if (!next) break;
            const { node, path } = next;
            if (criteria.maxDepth !== undefined && node.depth > criteria.maxDepth) {
                continue;
            }

            if (predicates.every(predicate => predicate(node))) {
                matches.push({ sourceId: document.sourceId, node, pathFromRoot: path });
            }

            // Shared by every child's matches, so it is frozen.
            const childPath = Object.freeze([...path, Object.freeze({ id: node.id, title: node.title })]);
            for (let i = node.children.length - 1; i >= 0; i--) {
                stack.push({ node: node.children[i], path: childPath });
            }
        }
    }

    return matches;
}

/**
 * Searches every successfully built document and reports failed builds in
 * place, so one bad file never hides the results of the others.
 */
export function searchOutcomes(outcomes: readonly BuildOutcome[], criteria: SearchCriteria = {}): DocumentSearchResult[] {
    const results = outcomes.map((outcome): DocumentSearchResult => {
        if (!outcome.ok) {
            return { sourceId: outcome.sourceId, ok: false, error: outcome.error };
        }
        return {
            sourceId: outcome.document.sourceId,
            ok: true,
            matches: search([outcome.document], criteria),
        };
    });

    const failed = results.filter(result => !result.ok).length;
    logger.debug(`Searched ${results.length - failed} documents, ${failed} failed to build`);
    return results;
}

export function searchTitles(document: MindmapDocument, keyword: string, caseSensitive: boolean = false): MatchResult[] {
    return search([document], { titleContains: keyword, caseSensitive });
}

export function jsonEquals(left: JsonValue, right: JsonValue): boolean {
    if (left === right) return true;
    if (Array.isArray(left) && Array.isArray(right)) {
        if (left.length !== right.length) return false;
        for (let i = 0; i < left.length; i++) {
            if (!jsonEquals(left[i], right[i])) return false;
        }
        return true;
    }
    if (isJsonObject(left) && isJsonObject(right)) {
        const keys = Object.keys(left);
        if (keys.length !== Object.keys(right).length) return false;
        for (const key of keys) {
            if (!Object.prototype.hasOwnProperty.call(right, key)) return false;
            if (!jsonEquals(left[key], right[key])) return false;
        }
        return true;
    }
    return false;
}
