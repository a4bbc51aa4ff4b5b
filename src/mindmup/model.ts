export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// One topic of a mind map. `parent` is non-enumerable, so serializing a node
// only ever walks downwards.
export interface MindmapNode {
    readonly id: string;
    readonly title: string;
    readonly attributes: Readonly<Record<string, JsonValue>>;
    readonly children: readonly MindmapNode[];
    readonly depth: number;
    readonly parent?: MindmapNode;
}

export interface DocumentMetadata {
    readonly title: string;
    readonly formatVersion: string;
    // Drive file name and modification time, when the file came from Drive.
    readonly name?: string;
    readonly modifiedTime?: string;
    // Map-wide keys of the top-level object, such as "links" and "theme".
    readonly extras: Readonly<Record<string, JsonValue>>;
}

export interface MindmapDocument {
    readonly sourceId: string;
    readonly root: MindmapNode;
    readonly metadata: DocumentMetadata;
}

export type BuildOutcome =
    | { ok: true; document: MindmapDocument }
    | { ok: false; sourceId: string; error: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
