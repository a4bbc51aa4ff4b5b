import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { MimeType, filterByName, isFolder, isMindmupFile } from "./query.js";
import type { DriveFile, DriveGateway, FileQuery } from "./types.js";

const logger = createLogger("discovery");

const FOLDER_PAGE = 1000;
const SEARCH_LIMIT = 100;

// Drive has no way to ask for "MindMup files", so the name queries cast wide
// and isMindmupFile narrows the result.
const DISCOVERY_QUERIES: FileQuery[] = [
    { text: "mindmup", maxResults: SEARCH_LIMIT },
    { text: "mindmap", maxResults: SEARCH_LIMIT },
    { text: ".mup", maxResults: SEARCH_LIMIT },
    { mimeTypes: [MimeType.MINDMUP], maxResults: SEARCH_LIMIT },
];

export interface DiscoveryOptions {
    folderScope?: string;
    nameFilter?: string;
}

export async function discoverMindmups(drive: DriveGateway, options: DiscoveryOptions = {}): Promise<DriveFile[]> {
    const files = options.folderScope
        ? await scanFolder(drive, options.folderScope)
        : await searchWholeDrive(drive);

    const mindmups = files.filter(isMindmupFile);
    logger.info(`Found ${mindmups.length} MindMup files${options.folderScope ? ` in folder ${options.folderScope}` : ""}`);

    return options.nameFilter ? filterByName(mindmups, options.nameFilter) : mindmups;
}

// Breadth-first over the folder and its subfolders. A folder reachable by two
// paths is listed once. Only a failure on the starting folder is fatal.
async function scanFolder(drive: DriveGateway, folderId: string): Promise<DriveFile[]> {
    const results: DriveFile[] = [];
    const visited = new Set<string>([folderId]);
    const queue: string[] = [folderId];

    while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;

        let entries: DriveFile[];
        try {
            entries = await drive.listFiles({ folderId: current, maxResults: FOLDER_PAGE });
        } catch (error) {
            if (current === folderId) throw error;
            logger.warn(`Skipping folder ${current}: ${errorMessage(error)}`);
            continue;
        }
        if (entries.length >= FOLDER_PAGE) {
            logger.warn(`Folder ${current} listing stopped at ${FOLDER_PAGE} entries, the rest are not searched`);
        }

        for (const entry of entries) {
            if (isFolder(entry)) {
                if (!visited.has(entry.id)) {
                    visited.add(entry.id);
                    queue.push(entry.id);
                }
            } else {
                results.push(entry);
            }
        }
    }

    return results;
}

async function searchWholeDrive(drive: DriveGateway): Promise<DriveFile[]> {
    const seen = new Map<string, DriveFile>();
    for (const query of DISCOVERY_QUERIES) {
        for (const file of await drive.listFiles(query)) {
            if (!seen.has(file.id)) seen.set(file.id, file);
        }
    }
    return Array.from(seen.values());
}
