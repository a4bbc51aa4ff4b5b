export interface DriveFile {
    id: string;
    name: string;
    mimeType: string;
    size?: number;
    modifiedTime?: string;
    createdTime?: string;
    parents: string[];
    webViewLink?: string;
    starred: boolean;
    shared: boolean;
    ownedByMe: boolean;
}

export interface FileQuery {
    // Matched against file names.
    text?: string;
    folderId?: string;
    mimeTypes?: string[];
    maxResults?: number;
    includeTrashed?: boolean;
}

/**
 * What the tools need from Drive. `DriveClient` talks to the API; tests use
 * an in-memory implementation.
 */
export interface DriveGateway {
    listFiles(query: FileQuery): Promise<DriveFile[]>;
    listFolders(maxResults?: number): Promise<DriveFile[]>;
    // Fails with NotFound or PermissionDenied.
    getFile(fileId: string): Promise<DriveFile>;
    fetchBytes(fileId: string): Promise<Uint8Array>;
}
