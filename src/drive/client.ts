import type { drive_v3 } from "googleapis";
import { DriveError, MindmupError, NotFound, PermissionDenied, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { MimeType, buildDriveQuery } from "./query.js";
import type { DriveFile, DriveGateway, FileQuery } from "./types.js";

const logger = createLogger("drive");

const FILE_FIELDS = "id, name, mimeType, size, modifiedTime, createdTime, parents, webViewLink, starred, shared, ownedByMe";
const DEFAULT_MAX_RESULTS = 100;
// Largest page files.list will return.
const MAX_PAGE_SIZE = 1000;

/**
 * Read-only access to Google Drive. Failures come out as NotFound,
 * PermissionDenied or DriveError.
 */
export class DriveClient implements DriveGateway {
    constructor(private readonly drive: drive_v3.Drive) {}

    async listFiles(query: FileQuery): Promise<DriveFile[]> {
        const q = buildDriveQuery(query);
        const limit = query.maxResults ?? DEFAULT_MAX_RESULTS;
        const files: DriveFile[] = [];
        let pageToken: string | undefined;

        logger.debug(`Listing files: ${q}`);
        do {
            const response = await this.call(undefined, () =>
                this.drive.files.list({
                    q,
                    pageSize: Math.min(limit - files.length, MAX_PAGE_SIZE),
                    pageToken,
                    fields: `nextPageToken, files(${FILE_FIELDS})`,
                    orderBy: "modifiedTime desc",
                    supportsAllDrives: true,
                    includeItemsFromAllDrives: true,
                })
            );
            for (const file of response.data.files ?? []) {
                const converted = toDriveFile(file);
                if (converted) files.push(converted);
            }
            pageToken = response.data.nextPageToken ?? undefined;
        } while (pageToken && files.length < limit);

        return files.slice(0, limit);
    }

    async listFolders(maxResults: number = DEFAULT_MAX_RESULTS): Promise<DriveFile[]> {
        return this.listFiles({ mimeTypes: [MimeType.FOLDER], maxResults });
    }

    async getFile(fileId: string): Promise<DriveFile> {
        const response = await this.call(fileId, () =>
            this.drive.files.get({ fileId, fields: FILE_FIELDS, supportsAllDrives: true })
        );
        const file = toDriveFile(response.data);
        if (!file) {
            throw new DriveError(`Drive returned no metadata for file: ${fileId}`, { fileId });
        }
        return file;
    }

    async fetchBytes(fileId: string): Promise<Uint8Array> {
        logger.debug(`Downloading ${fileId}`);
        const response = await this.call(fileId, () =>
            this.drive.files.get(
                { fileId, alt: "media", supportsAllDrives: true },
                { responseType: "arraybuffer" }
            )
        );
        const data: unknown = response.data;
        return toBytes(data, fileId);
    }

    private async call<T>(fileId: string | undefined, request: () => Promise<T>): Promise<T> {
        try {
            return await request();
        } catch (error) {
            throw translateDriveError(error, fileId);
        }
    }
}

export function translateDriveError(error: unknown, fileId?: string): MindmupError {
    if (error instanceof MindmupError) {
        return error;
    }
    const status = httpStatusOf(error);
    if (fileId !== undefined && status === 404) {
        return new NotFound(fileId);
    }
    if (fileId !== undefined && (status === 401 || status === 403)) {
        return new PermissionDenied(fileId);
    }
    return new DriveError(`Google Drive request failed: ${errorMessage(error)}`, {
        ...(status !== undefined ? { status } : {}),
        ...(fileId !== undefined ? { fileId } : {}),
    });
}

// Gaxios puts the status on `status`, on `code` or on `response.status`
// depending on the failure.
export function httpStatusOf(error: unknown): number | undefined {
    if (typeof error !== "object" || error === null) return undefined;
    if ("status" in error && typeof error.status === "number") return error.status;
    if ("code" in error) {
        const code = Number(error.code);
        if (Number.isInteger(code) && code >= 100 && code < 600) return code;
    }
    if ("response" in error && typeof error.response === "object" && error.response !== null) {
        const { response } = error;
        if ("status" in response && typeof response.status === "number") return response.status;
    }
    return undefined;
}

function toDriveFile(file: drive_v3.Schema$File): DriveFile | undefined {
    if (!file.id || !file.name) return undefined;

    const converted: DriveFile = {
        id: file.id,
        name: file.name,
        mimeType: file.mimeType ?? "application/octet-stream",
        parents: file.parents ?? [],
        starred: file.starred ?? false,
        shared: file.shared ?? false,
        ownedByMe: file.ownedByMe ?? false,
    };
    if (file.size) converted.size = Number(file.size);
    if (file.modifiedTime) converted.modifiedTime = file.modifiedTime;
    if (file.createdTime) converted.createdTime = file.createdTime;
    if (file.webViewLink) converted.webViewLink = file.webViewLink;
    return converted;
}

export function toBytes(data: unknown, fileId: string): Uint8Array {
    if (data instanceof Uint8Array) return data;
    if (data instanceof ArrayBuffer) return new Uint8Array(data);
    if (typeof data === "string") return new TextEncoder().encode(data);
    throw new DriveError(`Unexpected response body for file: ${fileId}`, { fileId });
}
