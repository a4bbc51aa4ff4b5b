import type { DriveFile, FileQuery } from "./types.js";

export const MimeType = {
    JSON: "application/json",
    TEXT: "text/plain",
    FOLDER: "application/vnd.google-apps.folder",
    MINDMUP: "application/vnd.mindmup",
} as const;

export function escapeQueryValue(value: string): string {
    return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

// Translates a FileQuery into the `q` parameter of Drive's files.list.
export function buildDriveQuery(query: FileQuery): string {
    const conditions: string[] = [];

    if (!query.includeTrashed) {
        conditions.push("trashed = false");
    }
    if (query.folderId) {
        conditions.push(`'${escapeQueryValue(query.folderId)}' in parents`);
    }
    if (query.text) {
        conditions.push(`name contains '${escapeQueryValue(query.text)}'`);
    }
    if (query.mimeTypes && query.mimeTypes.length > 0) {
        const alternatives = query.mimeTypes.map(type => `mimeType = '${escapeQueryValue(type)}'`);
        conditions.push(alternatives.length === 1 ? alternatives[0] : `(${alternatives.join(" or ")})`);
    }

    return conditions.join(" and ");
}

export function isFolder(file: DriveFile): boolean {
    return file.mimeType === MimeType.FOLDER;
}

// Drive rarely labels MindMup files with their own mime type, so names count too.
export function isMindmupFile(file: DriveFile): boolean {
    if (file.mimeType === MimeType.MINDMUP) {
        return true;
    }

    const name = file.name.toLowerCase();
    if (name.endsWith(".mup") || ["mindmup", "mindmap", "mind map"].some(word => name.includes(word))) {
        return true;
    }

    return file.mimeType === MimeType.JSON && ["mind", "map", "diagram"].some(word => name.includes(word));
}

/**
 * Keeps files whose name contains `pattern` (case-insensitive), names that
 * start with it first, then alphabetical.
 */
export function filterByName(files: readonly DriveFile[], pattern: string): DriveFile[] {
    const searchPattern = pattern.toLowerCase();

    return files
        .filter(file => file.name.toLowerCase().includes(searchPattern))
        .sort((a, b) => {
            const aName = a.name.toLowerCase();
            const bName = b.name.toLowerCase();

            const aPrefix = aName.startsWith(searchPattern);
            const bPrefix = bName.startsWith(searchPattern);
            if (aPrefix && !bPrefix) return -1;
            if (!aPrefix && bPrefix) return 1;

            return aName.localeCompare(bName);
        });
}
