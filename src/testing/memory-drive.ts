import { NotFound } from "../errors.js";
import type { DriveFile, DriveGateway, FileQuery } from "../drive/types.js";
import { MimeType } from "../drive/query.js";

export interface StoredFile {
    id: string;
    name: string;
    mimeType?: string;
    parents?: string[];
    modifiedTime?: string;
    content?: string | Uint8Array;
}

// In-process stand-in for Google Drive. Failures set with `failWith` are
// thrown on every access to that id.
export class MemoryDrive implements DriveGateway {
    readonly queries: FileQuery[] = [];
    private readonly files = new Map<string, StoredFile>();
    private readonly failures = new Map<string, unknown>();

    constructor(files: StoredFile[] = []) {
        for (const file of files) this.add(file);
    }

    add(file: StoredFile): this {
        this.files.set(file.id, file);
        return this;
    }

    addFolder(id: string, name: string, parent?: string): this {
        return this.add({ id, name, mimeType: MimeType.FOLDER, parents: parent ? [parent] : [] });
    }

    addJson(id: string, name: string, value: unknown, parent?: string): this {
        return this.add({
            id,
            name,
            mimeType: MimeType.JSON,
            parents: parent ? [parent] : [],
            content: JSON.stringify(value),
        });
    }

    failWith(id: string, error: unknown): this {
        this.failures.set(id, error);
        return this;
    }

    async listFiles(query: FileQuery): Promise<DriveFile[]> {
        this.queries.push(query);
        const failure = query.folderId === undefined ? undefined : this.failures.get(query.folderId);
        if (failure !== undefined) throw failure;

        const text = query.text?.toLowerCase();
        return Array.from(this.files.values())
            .filter(file => query.folderId === undefined || (file.parents ?? []).includes(query.folderId))
            .filter(file => text === undefined || file.name.toLowerCase().includes(text))
            .filter(file => !query.mimeTypes?.length || query.mimeTypes.includes(this.describe(file).mimeType))
            .slice(0, query.maxResults ?? 100)
            .map(file => this.describe(file));
    }

    async listFolders(maxResults: number = 100): Promise<DriveFile[]> {
        return this.listFiles({ mimeTypes: [MimeType.FOLDER], maxResults });
    }

    async getFile(fileId: string): Promise<DriveFile> {
        return this.describe(this.lookup(fileId));
    }

    async fetchBytes(fileId: string): Promise<Uint8Array> {
        const { content = "" } = this.lookup(fileId);
        return typeof content === "string" ? new TextEncoder().encode(content) : content;
    }

    private lookup(fileId: string): StoredFile {
        const failure = this.failures.get(fileId);
        if (failure !== undefined) throw failure;
        const file = this.files.get(fileId);
        if (!file) throw new NotFound(fileId);
        return file;
    }

    private describe(file: StoredFile): DriveFile {
        const described: DriveFile = {
            id: file.id,
            name: file.name,
            mimeType: file.mimeType ?? MimeType.JSON,
            parents: file.parents ?? [],
            starred: false,
            shared: false,
            ownedByMe: true,
        };
        if (file.modifiedTime) described.modifiedTime = file.modifiedTime;
        if (typeof file.content === "string") described.size = Buffer.byteLength(file.content, "utf8");
        return described;
    }
}
