export type ErrorCode =
    | "PARSE_ERROR"
    | "DEPTH_EXCEEDED"
    | "DOCUMENT_TOO_LARGE"
    | "NOT_FOUND"
    | "PERMISSION_DENIED"
    | "GDRIVE_ERROR"
    | "CONFIG_ERROR"
    | "UNKNOWN_ERROR";

export interface ErrorPayload {
    code: ErrorCode;
    message: string;
    details: Record<string, unknown>;
}

export class MindmupError extends Error {
    readonly code: ErrorCode;
    readonly details: Record<string, unknown>;

    constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
    }

    toJSON(): ErrorPayload {
        return {
            code: this.code,
            message: this.message,
            details: this.details,
        };
    }
}

// Input is not UTF-8 encoded JSON. `offset` is a byte offset into the input.
export class ParseError extends MindmupError {
    readonly offset?: number;

    constructor(message: string, offset?: number) {
        super("PARSE_ERROR", message, offset === undefined ? {} : { offset });
        this.offset = offset;
    }
}

export class DepthExceeded extends MindmupError {
    readonly limit: number;

    constructor(limit: number) {
        super("DEPTH_EXCEEDED", `Mind map nesting exceeds the depth limit of ${limit}`, { limit });
        this.limit = limit;
    }
}

export class DocumentTooLarge extends MindmupError {
    constructor(size: number, limit: number) {
        super("DOCUMENT_TOO_LARGE", `Document is ${size} bytes, the limit is ${limit}`, { size, limit });
    }
}

export class NotFound extends MindmupError {
    constructor(fileId: string) {
        super("NOT_FOUND", `File not found: ${fileId}`, { fileId });
    }
}

export class PermissionDenied extends MindmupError {
    constructor(fileId: string) {
        super("PERMISSION_DENIED", `Permission denied for file: ${fileId}`, { fileId });
    }
}

export class DriveError extends MindmupError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super("GDRIVE_ERROR", message, details);
    }
}

export class ConfigurationError extends MindmupError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super("CONFIG_ERROR", message, details);
    }
}

export function toErrorPayload(error: unknown): ErrorPayload {
    if (error instanceof MindmupError) {
        return error.toJSON();
    }
    return {
        code: "UNKNOWN_ERROR",
        message: errorMessage(error),
        details: {},
    };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
