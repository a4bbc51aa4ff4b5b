import type { AppConfig } from "../config.js";
import { DocumentTooLarge } from "../errors.js";
import type { DriveFile, DriveGateway } from "../drive/types.js";
import { createLogger } from "../logger.js";
import { buildDocument, tryBuildDocument, type BuildOptions } from "../mindmup/builder.js";
import type { BuildOutcome, MindmapDocument } from "../mindmup/model.js";

const logger = createLogger("documents");

export interface ToolContext {
    drive: DriveGateway;
    config: Readonly<AppConfig>;
}

function buildOptions(context: ToolContext, file: DriveFile): BuildOptions {
    return {
        sourceId: file.id,
        limits: context.config,
        metadata: {
            name: file.name,
            ...(file.modifiedTime !== undefined ? { modifiedTime: file.modifiedTime } : {}),
        },
    };
}

// Drive reports the size with the metadata, so an oversized file is refused
// before its body is downloaded.
function checkSize(context: ToolContext, file: DriveFile): void {
    if (file.size !== undefined && file.size > context.config.maxDocumentBytes) {
        throw new DocumentTooLarge(file.size, context.config.maxDocumentBytes);
    }
}

// Throws whatever Drive or the builder throws.
export async function loadDocument(context: ToolContext, fileId: string): Promise<MindmapDocument> {
    const file = await context.drive.getFile(fileId);
    checkSize(context, file);
    const bytes = await context.drive.fetchBytes(fileId);
    logger.info(`Loaded ${file.name} (${bytes.byteLength} bytes)`);
    return buildDocument(bytes, buildOptions(context, file));
}

export async function loadOutcome(context: ToolContext, target: DriveFile | string): Promise<BuildOutcome> {
    const sourceId = typeof target === "string" ? target : target.id;
    try {
        const file = typeof target === "string" ? await context.drive.getFile(target) : target;
        checkSize(context, file);
        const bytes = await context.drive.fetchBytes(file.id);
        return tryBuildDocument(bytes, buildOptions(context, file));
    } catch (error) {
        logger.warn(`Could not load ${sourceId}`, error);
        return { ok: false, sourceId, error };
    }
}

// One file at a time, in the order of `targets`.
export async function loadOutcomes(
    context: ToolContext,
    targets: ReadonlyArray<DriveFile | string>
): Promise<BuildOutcome[]> {
    const outcomes: BuildOutcome[] = [];
    for (const target of targets) {
        outcomes.push(await loadOutcome(context, target));
    }
    return outcomes;
}
