import type { BuildLimits } from "../config.js";
import { DepthExceeded, DocumentTooLarge, ParseError } from "../errors.js";
import { createLogger } from "../logger.js";
import {
    isJsonObject,
    type BuildOutcome,
    type DocumentMetadata,
    type JsonObject,
    type JsonValue,
    type MindmapDocument,
    type MindmapNode,
} from "./model.js";

const logger = createLogger("builder");

// Keys of a node that the model reads itself instead of keeping as attributes.
const NODE_KEYS = new Set(["id", "title", "ideas", "children", "attr"]);
// Keys of the top-level object that describe the whole map.
const DOCUMENT_KEYS = new Set(["formatVersion", "links", "theme"]);

const DEFAULT_FORMAT_VERSION = "1.0";
const MAX_LOGGED_ANOMALIES = 20;
// A derived id longer than this is replaced by the node's pre-order position.
const MAX_DERIVED_ID_LENGTH = 64;

export interface BuildOptions {
    sourceId: string;
    limits: BuildLimits;
    metadata?: {
        name?: string;
        modifiedTime?: string;
    };
}

class BuildContext {
    readonly anomalies: string[] = [];
    private readonly usedIds = new Set<string>();
    private readonly ancestors = new Set<JsonObject>();
    private position = 0;

    constructor(readonly limits: BuildLimits) {}

    note(anomaly: string): void {
        this.anomalies.push(anomaly);
    }

    enter(source: JsonObject): void {
        this.ancestors.add(source);
    }

    leave(source: JsonObject): void {
        this.ancestors.delete(source);
    }

    isAncestor(source: JsonObject): boolean {
        return this.ancestors.has(source);
    }

    // Called once per node in pre-order. First use of an id keeps it; later
    // uses get "#2", "#3"...
    assignId(raw: JsonValue | undefined, parent: MindmapNode | undefined, key: string): string {
        const position = this.position++;
        let candidate: string | undefined;
        if (typeof raw === "string" && raw.trim() !== "") {
            candidate = raw;
        } else if (typeof raw === "number" && Number.isFinite(raw)) {
            candidate = String(raw);
        }

        if (candidate === undefined) {
            candidate = parent ? `${parent.id}/${key}` : "root";
            if (candidate.length > MAX_DERIVED_ID_LENGTH) candidate = `node-${position}`;
            this.note(`missing id, using "${candidate}"`);
        }

        if (this.usedIds.has(candidate)) {
            let suffix = 2;
            while (this.usedIds.has(`${candidate}#${suffix}`)) suffix++;
            const unique = `${candidate}#${suffix}`;
            logger.debug(`Duplicate node id "${candidate}" renamed to "${unique}"`);
            this.note(`duplicate id "${candidate}"`);
            candidate = unique;
        }

        this.usedIds.add(candidate);
        return candidate;
    }
}

/**
 * Parses the bytes of a MindMup file into a document tree.
 *
 * Throws DocumentTooLarge, ParseError (not UTF-8, not JSON) or DepthExceeded.
 * JSON that parses but does not look like a mind map never throws: missing
 * fields take defaults and unknown fields are kept as attributes.
 */
export function buildDocument(raw: Uint8Array | string, options: BuildOptions): MindmapDocument {
    const size = typeof raw === "string" ? Buffer.byteLength(raw, "utf8") : raw.byteLength;
    if (size > options.limits.maxDocumentBytes) {
        throw new DocumentTooLarge(size, options.limits.maxDocumentBytes);
    }
    return buildDocumentFromValue(parseJson(decodeText(raw)), options);
}

/** Like buildDocument, but reports failure as a value instead of throwing. */
export function tryBuildDocument(raw: Uint8Array | string, options: BuildOptions): BuildOutcome {
    try {
        return { ok: true, document: buildDocument(raw, options) };
    } catch (error) {
        logger.warn(`Could not build mind map ${options.sourceId}`, error);
        return { ok: false, sourceId: options.sourceId, error };
    }
}

export function buildDocumentFromValue(value: JsonValue, options: BuildOptions): MindmapDocument {
    const context = new BuildContext(options.limits);

    let root: MindmapNode;
    let formatVersion = DEFAULT_FORMAT_VERSION;
    const extras: Record<string, JsonValue> = {};

    if (isJsonObject(value)) {
        root = buildNode(value, "", undefined, 0, context);
        formatVersion = readFormatVersion(value.formatVersion);
        for (const key of DOCUMENT_KEYS) {
            if (key !== "formatVersion" && key in value) {
                extras[key] = snapshot(value[key], 1, context.limits.maxDepth);
            }
        }
    } else {
        const message = `Expected a JSON object at the top level, found ${kindOf(value)}`;
        context.note(message);
        root = Object.freeze({
            id: "root",
            title: "",
            attributes: Object.freeze({ error: message }),
            children: Object.freeze([]),
            depth: 0,
        });
    }

    if (context.anomalies.length > 0) {
        logger.warn(`Recovered from ${context.anomalies.length} anomalies in ${options.sourceId}`,
            context.anomalies.slice(0, MAX_LOGGED_ANOMALIES));
    }

    const metadata: DocumentMetadata = {
        title: root.title,
        formatVersion,
        extras: Object.freeze(extras),
        ...(options.metadata?.name !== undefined ? { name: options.metadata.name } : {}),
        ...(options.metadata?.modifiedTime !== undefined ? { modifiedTime: options.metadata.modifiedTime } : {}),
    };

    return Object.freeze({
        sourceId: options.sourceId,
        root,
        metadata: Object.freeze(metadata),
    });
}

function buildNode(
    source: JsonObject,
    key: string,
    parent: MindmapNode | undefined,
    depth: number,
    context: BuildContext
): MindmapNode {
    if (depth > context.limits.maxDepth) {
        throw new DepthExceeded(context.limits.maxDepth);
    }

    const children: MindmapNode[] = [];
    const node: MindmapNode = {
        id: context.assignId(source.id, parent, key),
        title: readTitle(source.title, context),
        attributes: collectAttributes(source, depth === 0, context),
        children,
        depth,
    };
    if (parent) {
        Object.defineProperty(node, "parent", { value: parent, enumerable: false });
    }

    context.enter(source);
    for (const [childKey, child] of childEntries(source, context)) {
        if (!isJsonObject(child)) {
            context.note(`skipped ${kindOf(child)} child "${childKey}" of "${node.id}"`);
            continue;
        }
        if (context.isAncestor(child)) {
            context.note(`skipped cyclic child "${childKey}" of "${node.id}"`);
            continue;
        }
        children.push(buildNode(child, childKey, node, depth + 1, context));
    }
    context.leave(source);

    Object.freeze(children);
    return Object.freeze(node);
}

function childEntries(source: JsonObject, context: BuildContext): Array<[string, JsonValue]> {
    const entries: Array<[string, JsonValue]> = [];
    const { ideas, children } = source;

    if (isJsonObject(ideas)) {
        entries.push(...byRank(Object.entries(ideas)));
    } else if (Array.isArray(ideas)) {
        ideas.forEach((idea, index) => entries.push([String(index + 1), idea]));
    } else if (ideas !== undefined && ideas !== null) {
        context.note(`ignored "ideas" of type ${kindOf(ideas)}`);
    }

    if (Array.isArray(children)) {
        children.forEach((child, index) => entries.push([String(index + 1), child]));
    }

    return entries;
}

// MindMup keys children by rank: numeric order is the visual order, negative
// ranks sit left of the root. Non-numeric keys follow in encounter order.
function byRank(entries: Array<[string, JsonValue]>): Array<[string, JsonValue]> {
    const ranked = entries.map(([key, value], index) => {
        const rank = key.trim() === "" ? Number.NaN : Number(key);
        return { key, value, index, rank, numeric: Number.isFinite(rank) };
    });

    ranked.sort((a, b) => {
        if (a.numeric && b.numeric) return a.rank - b.rank || a.index - b.index;
        if (a.numeric) return -1;
        if (b.numeric) return 1;
        return a.index - b.index;
    });

    return ranked.map(({ key, value }): [string, JsonValue] => [key, value]);
}

function collectAttributes(source: JsonObject, isRoot: boolean, context: BuildContext): Readonly<Record<string, JsonValue>> {
    // Object.fromEntries keeps a "__proto__" key as plain data.
    const attributes = new Map<string, JsonValue>();

    for (const [key, value] of Object.entries(source)) {
        if (isRoot && DOCUMENT_KEYS.has(key)) continue;
        if (key === "children" && !Array.isArray(value)) {
            attributes.set(key, value);
            continue;
        }
        if (key === "ideas" && !isJsonObject(value) && !Array.isArray(value) && value !== null) {
            attributes.set(key, value);
            continue;
        }
        if (NODE_KEYS.has(key)) continue;
        attributes.set(key, value);
    }

    const { attr } = source;
    if (isJsonObject(attr)) {
        for (const [key, value] of Object.entries(attr)) {
            if (attributes.has(key)) {
                context.note(`attribute "${key}" given twice, keeping the "attr" entry`);
            }
            attributes.set(key, value);
        }
    } else if (attr !== undefined) {
        attributes.set("attr", attr);
    }

    const frozen = new Map<string, JsonValue>();
    for (const [key, value] of attributes) {
        frozen.set(key, snapshot(value, 1, context.limits.maxDepth));
    }
    return Object.freeze(Object.fromEntries(frozen));
}

// Copies an attribute value into frozen data. Nesting past the depth limit
// fails, which also ends cycles in values handed in as objects.
function snapshot(value: JsonValue, level: number, limit: number): JsonValue {
    if (typeof value !== "object" || value === null) return value;
    if (level > limit) {
        throw new DepthExceeded(limit);
    }
    if (Array.isArray(value)) {
        const items = value.map(item => snapshot(item, level + 1, limit));
        Object.freeze(items);
        return items;
    }
    const copy = Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, snapshot(item, level + 1, limit)])
    );
    return Object.freeze(copy);
}

function readTitle(value: JsonValue | undefined, context: BuildContext): string {
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    if (value !== undefined && value !== null) {
        context.note(`ignored title of type ${kindOf(value)}`);
    }
    return "";
}

function readFormatVersion(value: JsonValue | undefined): string {
    if (typeof value === "string" && value.trim() !== "") return value;
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return DEFAULT_FORMAT_VERSION;
}

function decodeText(raw: Uint8Array | string): string {
    if (typeof raw === "string") {
        return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    }
    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(raw);
    } catch {
        throw new ParseError("Input is not valid UTF-8");
    }
}

function parseJson(text: string): JsonValue {
    try {
        return JSON.parse(text);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ParseError(`Invalid JSON: ${message}`, locateSyntaxError(text, message));
    }
}

/**
 * Converts the character position in a JSON.parse message to a byte offset
 * into the UTF-8 input. Undefined when the message carries no position.
 */
export function locateSyntaxError(text: string, message: string): number | undefined {
    const match = /at position (\d+)/.exec(message);
    if (!match) return undefined;
    const position = Math.min(Number(match[1]), text.length);
    return Buffer.byteLength(text.slice(0, position), "utf8");
}

function kindOf(value: JsonValue): string {
    if (value === null) return "null";
    if (Array.isArray(value)) return "array";
    return typeof value;
}
