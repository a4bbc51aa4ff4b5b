import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogFormat, LogLevel } from "./logger.js";

export interface BuildLimits {
    maxDepth: number;
    maxDocumentBytes: number;
}

export interface AppConfig extends BuildLimits {
    credentialsFile?: string;
    caseSensitiveTitles: boolean;
    maxContentLength: number;
    logLevel: LogLevel;
    logFormat: LogFormat;
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
    maxDepth: 256,
    maxDocumentBytes: 10 * 1024 * 1024,
    caseSensitiveTitles: false,
    maxContentLength: 1024 * 1024,
    logLevel: "info",
    logFormat: "text",
};

// Above this the recursive builder could reach the engine's stack limit.
const DEPTH_CEILING = 2000;

const booleanFlag = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform(value => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
    GOOGLE_DRIVE_CREDENTIALS_FILE: z.string().min(1).optional(),
    MINDMUP_MAX_DEPTH: z.coerce.number().int().min(1).max(DEPTH_CEILING).default(DEFAULT_CONFIG.maxDepth),
    MINDMUP_MAX_DOCUMENT_BYTES: z.coerce.number().int().positive().default(DEFAULT_CONFIG.maxDocumentBytes),
    MINDMUP_CASE_SENSITIVE: booleanFlag.default("false"),
    MINDMUP_MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(DEFAULT_CONFIG.maxContentLength),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default(DEFAULT_CONFIG.logLevel),
    LOG_FORMAT: z.enum(["text", "json"]).default(DEFAULT_CONFIG.logFormat),
});

type Env = Record<string, string | undefined>;

/**
 * Reads configuration from the environment. Empty variables count as unset.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
    const present: Env = {};
    for (const key of Object.keys(EnvSchema.shape)) {
        const value = env[key]?.trim();
        if (value) present[key] = value;
    }

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
    }

    const values = parsed.data;
    const config: AppConfig = {
        maxDepth: values.MINDMUP_MAX_DEPTH,
        maxDocumentBytes: values.MINDMUP_MAX_DOCUMENT_BYTES,
        caseSensitiveTitles: values.MINDMUP_CASE_SENSITIVE,
        maxContentLength: values.MINDMUP_MAX_CONTENT_LENGTH,
        logLevel: values.LOG_LEVEL,
        logFormat: values.LOG_FORMAT,
    };
    if (values.GOOGLE_DRIVE_CREDENTIALS_FILE) {
        config.credentialsFile = values.GOOGLE_DRIVE_CREDENTIALS_FILE;
    }
    return Object.freeze(config);
}
