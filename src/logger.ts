// stdout carries the MCP stream, so every log line goes to stderr.

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "text" | "json";

export interface Logger {
    debug(message: string, data?: unknown): void;
    info(message: string, data?: unknown): void;
    warn(message: string, data?: unknown): void;
    error(message: string, data?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let threshold: LogLevel = "info";
let format: LogFormat = "text";

export function configureLogging(options: { level?: LogLevel; format?: LogFormat }): void {
    if (options.level) threshold = options.level;
    if (options.format) format = options.format;
}

function describe(data: unknown): unknown {
    if (data instanceof Error) {
        return { name: data.name, message: data.message };
    }
    return data;
}

function write(level: LogLevel, scope: string, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
        return;
    }
    const timestamp = new Date().toISOString();

    if (format === "json") {
        const entry: Record<string, unknown> = { timestamp, level, scope, message };
        if (data !== undefined) entry.data = describe(data);
        console.error(JSON.stringify(entry));
        return;
    }

    const line = `${timestamp} ${level.toUpperCase()} [${scope}] ${message}`;
    console.error(data === undefined ? line : `${line}: ${JSON.stringify(describe(data))}`);
}

export function createLogger(scope: string): Logger {
    return {
        debug: (message, data) => write("debug", scope, message, data),
        info: (message, data) => write("info", scope, message, data),
        warn: (message, data) => write("warn", scope, message, data),
        error: (message, data) => write("error", scope, message, data),
    };
}
