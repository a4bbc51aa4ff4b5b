import { toErrorPayload, type ErrorPayload } from "../errors.js";
import type { JsonValue, MindmapDocument, MindmapNode } from "./model.js";
import type { DocumentSearchResult, MatchResult, PathStep, SearchCriteria } from "./search.js";
import { countNodes, getNodePath, maxDepth, type NodeContext, type TitleChunk } from "./tree.js";

// Everything here returns plain data: no parent links, attribute keys sorted,
// fields in a fixed order. Equal input serializes to equal text.

export interface FormattedMatch {
    sourceId: string;
    id: string;
    title: string;
    depth: number;
    path: string;
    pathFromRoot: PathStep[];
    attributes: Record<string, JsonValue>;
    childCount: number;
}

export type FormattedDocumentResult =
    | { sourceId: string; matchCount: number; matches: FormattedMatch[] }
    | { sourceId: string; error: ErrorPayload };

export interface SearchResponse {
    query: Record<string, JsonValue>;
    results: FormattedDocumentResult[];
    totalMatches: number;
    failedDocuments: number;
}

export interface FormattedNode {
    id: string;
    title: string;
    attributes: Record<string, JsonValue>;
    children: FormattedNode[];
}

export interface FormattedDocument {
    sourceId: string;
    title: string;
    formatVersion: string;
    name: string | null;
    modifiedTime: string | null;
    nodeCount: number;
    maxDepth: number;
    extras: Record<string, JsonValue>;
    root: FormattedNode;
}

export interface NodeReference {
    id: string;
    title: string;
}

export interface FormattedNodeContext {
    sourceId: string;
    mindmapTitle: string;
    node: {
        id: string;
        title: string;
        depth: number;
        path: string;
        attributes: Record<string, JsonValue>;
    };
    parent: NodeReference | null;
    children: NodeReference[];
    siblings?: NodeReference[];
}

export interface ChunkedContent {
    sourceId: string;
    mindmapTitle: string;
    totalNodes: number;
    chunkSize: number;
    totalChunks: number;
    chunks: TitleChunk[];
}

export function canonicalize(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
        return value.map(canonicalize);
    }
    if (typeof value === "object" && value !== null) {
        return canonicalAttributes(value);
    }
    return value;
}

function canonicalAttributes(attributes: Readonly<Record<string, JsonValue>>): Record<string, JsonValue> {
    const keys = Object.keys(attributes).sort();
    return Object.fromEntries(keys.map(key => [key, canonicalize(attributes[key])]));
}

function reference(node: MindmapNode): NodeReference {
    return { id: node.id, title: node.title };
}

export function formatMatch(match: MatchResult): FormattedMatch {
    const { node } = match;
    return {
        sourceId: match.sourceId,
        id: node.id,
        title: node.title,
        depth: node.depth,
        path: [...match.pathFromRoot.map(step => step.title), node.title].join(" > "),
        pathFromRoot: match.pathFromRoot.map(step => ({ id: step.id, title: step.title })),
        attributes: canonicalAttributes(node.attributes),
        childCount: node.children.length,
    };
}

export function formatMatches(matches: readonly MatchResult[]): FormattedMatch[] {
    return matches.map(formatMatch);
}

export function formatCriteria(criteria: SearchCriteria): Record<string, JsonValue> {
    const query: Record<string, JsonValue> = {};
    if (criteria.titleContains !== undefined) query.titleContains = criteria.titleContains;
    if (criteria.caseSensitive !== undefined) query.caseSensitive = criteria.caseSensitive;
    if (criteria.attributeEquals !== undefined) {
        query.attributeEquals = {
            key: criteria.attributeEquals.key,
            value: canonicalize(criteria.attributeEquals.value),
        };
    }
    if (criteria.maxDepth !== undefined) query.maxDepth = criteria.maxDepth;
    if (criteria.folderScope !== undefined) query.folderScope = criteria.folderScope;
    return query;
}

export function formatSearchResults(results: readonly DocumentSearchResult[], criteria: SearchCriteria = {}): SearchResponse {
    let totalMatches = 0;
    let failedDocuments = 0;

    const formatted = results.map((result): FormattedDocumentResult => {
        if (!result.ok) {
            failedDocuments++;
            return { sourceId: result.sourceId, error: toErrorPayload(result.error) };
        }
        totalMatches += result.matches.length;
        return {
            sourceId: result.sourceId,
            matchCount: result.matches.length,
            matches: formatMatches(result.matches),
        };
    });

    return {
        query: formatCriteria(criteria),
        results: formatted,
        totalMatches,
        failedDocuments,
    };
}

// Recursion is bounded by the builder's depth limit.
function formatNode(node: MindmapNode): FormattedNode {
    return {
        id: node.id,
        title: node.title,
        attributes: canonicalAttributes(node.attributes),
        children: node.children.map(formatNode),
    };
}

export function formatDocument(document: MindmapDocument): FormattedDocument {
    return {
        sourceId: document.sourceId,
        title: document.metadata.title,
        formatVersion: document.metadata.formatVersion,
        name: document.metadata.name ?? null,
        modifiedTime: document.metadata.modifiedTime ?? null,
        nodeCount: countNodes(document),
        maxDepth: maxDepth(document),
        extras: canonicalAttributes(document.metadata.extras),
        root: formatNode(document.root),
    };
}

export function formatNodeContext(document: MindmapDocument, context: NodeContext): FormattedNodeContext {
    const formatted: FormattedNodeContext = {
        sourceId: document.sourceId,
        mindmapTitle: document.metadata.title,
        node: {
            id: context.node.id,
            title: context.node.title,
            depth: context.node.depth,
            path: getNodePath(context.node),
            attributes: canonicalAttributes(context.node.attributes),
        },
        parent: context.parent ? reference(context.parent) : null,
        children: context.children.map(reference),
    };
    if (context.siblings) {
        formatted.siblings = context.siblings.map(reference);
    }
    return formatted;
}

export function formatChunks(document: MindmapDocument, chunks: TitleChunk[], chunkSize: number): ChunkedContent {
    return {
        sourceId: document.sourceId,
        mindmapTitle: document.metadata.title,
        totalNodes: chunks.reduce((total, chunk) => total + chunk.nodeCount, 0),
        chunkSize,
        totalChunks: chunks.length,
        chunks,
    };
}

export function serialize(value: unknown): string {
    return JSON.stringify(value, null, 2);
}
