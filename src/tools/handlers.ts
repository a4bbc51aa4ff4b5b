import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { toErrorPayload } from "../errors.js";
import { discoverMindmups } from "../drive/discovery.js";
import type { DriveFile } from "../drive/types.js";
import { createLogger } from "../logger.js";
import {
    formatChunks,
    formatDocument,
    formatMatches,
    formatNodeContext,
    formatSearchResults,
    serialize,
} from "../mindmup/formatter.js";
import type { MindmapDocument } from "../mindmup/model.js";
import { searchOutcomes, searchTitles, type SearchCriteria } from "../mindmup/search.js";
import { chunkTitles, collectTitles, countNodes, findNodeContext, truncateContent } from "../mindmup/tree.js";
import { loadDocument, loadOutcomes, type ToolContext } from "./documents.js";
import {
    GetChunkedMindmapContentArgsSchema,
    GetMindmapContentArgsSchema,
    GetMindmapNodeArgsSchema,
    ListAccessibleFoldersArgsSchema,
    ListGdriveFilesArgsSchema,
    SearchAndParseMindmapsArgsSchema,
    SearchMindmapContentArgsSchema,
    SearchMindmapNodesArgsSchema,
    SearchMindmapsArgsSchema,
} from "./schemas.js";

const logger = createLogger("tools");

const PREVIEW_LENGTH = 500;

function textResult(value: unknown): CallToolResult {
    return {
        content: [{ type: "text", text: serialize(value) }],
    };
}

function describeFile(file: DriveFile) {
    return {
        id: file.id,
        name: file.name,
        mimeType: file.mimeType,
        size: file.size ?? null,
        modifiedTime: file.modifiedTime ?? null,
        createdTime: file.createdTime ?? null,
        webViewLink: file.webViewLink ?? null,
        starred: file.starred,
        shared: file.shared,
        ownedByMe: file.ownedByMe,
    };
}

function describeFolder(folder: DriveFile) {
    return {
        id: folder.id,
        name: folder.name,
        modifiedTime: folder.modifiedTime ?? null,
        webViewLink: folder.webViewLink ?? null,
        starred: folder.starred,
        shared: folder.shared,
        ownedByMe: folder.ownedByMe,
    };
}

function allText(document: MindmapDocument, maxLength: number) {
    const truncated = truncateContent(collectTitles(document).join(" "), maxLength);
    if (truncated.truncated) {
        logger.warn(`Text of ${document.sourceId} cut from ${truncated.originalLength} to ${maxLength} characters`);
    }
    return truncated;
}

function preview(text: string): string {
    return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Runs one tool. Never throws: bad arguments, Drive failures and unreadable
 * files all come back as an `isError` result.
 */
export async function handleToolCall(name: string, args: unknown, context: ToolContext): Promise<CallToolResult> {
    try {
        switch (name) {
            case "list_gdrive_files": {
                const parsed = ListGdriveFilesArgsSchema.safeParse(args ?? {});
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for list_gdrive_files: ${parsed.error}`);
                }
                const { maxResults, fileType, nameContains, folderId } = parsed.data;
                const files = await context.drive.listFiles({
                    maxResults,
                    ...(fileType !== undefined ? { mimeTypes: [fileType] } : {}),
                    ...(nameContains !== undefined ? { text: nameContains } : {}),
                    ...(folderId !== undefined ? { folderId } : {}),
                });
                return textResult({ files: files.map(describeFile), count: files.length });
            }

            case "list_accessible_folders": {
                const parsed = ListAccessibleFoldersArgsSchema.safeParse(args ?? {});
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for list_accessible_folders: ${parsed.error}`);
                }
                const folders = await context.drive.listFolders(parsed.data.maxResults);
                return textResult({ folders: folders.map(describeFolder), count: folders.length });
            }

            case "search_mindmaps": {
                const parsed = SearchMindmapsArgsSchema.safeParse(args ?? {});
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for search_mindmaps: ${parsed.error}`);
                }
                const files = await discoverMindmups(context.drive, {
                    folderScope: parsed.data.folderId,
                    nameFilter: parsed.data.nameContains,
                });
                return textResult({ files: files.map(describeFile), count: files.length });
            }

            case "get_mindmap_content": {
                const parsed = GetMindmapContentArgsSchema.safeParse(args);
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for get_mindmap_content: ${parsed.error}`);
                }
                const document = await loadDocument(context, parsed.data.fileId);
                const text = allText(document, context.config.maxContentLength);
                return textResult({
                    ...formatDocument(document),
                    allTextContent: text.content,
                    contentTruncated: text.truncated,
                    originalContentLength: text.originalLength,
                });
            }

            case "search_and_parse_mindmaps": {
                const parsed = SearchAndParseMindmapsArgsSchema.safeParse(args ?? {});
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for search_and_parse_mindmaps: ${parsed.error}`);
                }
                const files = await discoverMindmups(context.drive, {
                    folderScope: parsed.data.folderId,
                    nameFilter: parsed.data.nameContains,
                });
                const outcomes = await loadOutcomes(context, files);

                let failedCount = 0;
                const results = outcomes.map((outcome, index) => {
                    const file = files[index];
                    if (!outcome.ok) {
                        failedCount++;
                        return { fileId: file.id, fileName: file.name, error: toErrorPayload(outcome.error) };
                    }
                    const { document } = outcome;
                    const text = allText(document, context.config.maxContentLength);
                    return {
                        fileId: file.id,
                        fileName: file.name,
                        webViewLink: file.webViewLink ?? null,
                        modifiedTime: file.modifiedTime ?? null,
                        title: document.metadata.title,
                        formatVersion: document.metadata.formatVersion,
                        nodeCount: countNodes(document),
                        allTextContent: text.content,
                        contentTruncated: text.truncated,
                        originalContentLength: text.originalLength,
                        preview: preview(text.content),
                    };
                });
                return textResult({ results, count: results.length, failedCount });
            }

            case "search_mindmap_content": {
                const parsed = SearchMindmapContentArgsSchema.safeParse(args);
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for search_mindmap_content: ${parsed.error}`);
                }
                const { fileId, keyword } = parsed.data;
                const caseSensitive = parsed.data.caseSensitive ?? context.config.caseSensitiveTitles;
                const document = await loadDocument(context, fileId);
                const matches = searchTitles(document, keyword, caseSensitive);
                logger.info(`Found ${matches.length} matches for "${keyword}" in ${fileId}`);
                return textResult({
                    fileId,
                    keyword,
                    caseSensitive,
                    mindmapTitle: document.metadata.title,
                    totalMatches: matches.length,
                    matches: formatMatches(matches),
                });
            }

            case "search_mindmap_nodes": {
                const parsed = SearchMindmapNodesArgsSchema.safeParse(args ?? {});
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for search_mindmap_nodes: ${parsed.error}`);
                }
                const { fileIds, folderId, titleContains, attributeEquals, maxDepth } = parsed.data;
                const criteria: SearchCriteria = {
                    ...(titleContains !== undefined ? { titleContains } : {}),
                    caseSensitive: parsed.data.caseSensitive ?? context.config.caseSensitiveTitles,
                    ...(attributeEquals !== undefined ? { attributeEquals } : {}),
                    ...(maxDepth !== undefined ? { maxDepth } : {}),
                    ...(folderId !== undefined ? { folderScope: folderId } : {}),
                };
                const targets = fileIds ?? await discoverMindmups(context.drive, { folderScope: folderId });
                const outcomes = await loadOutcomes(context, targets);
                return textResult(formatSearchResults(searchOutcomes(outcomes, criteria), criteria));
            }

            case "get_mindmap_node": {
                const parsed = GetMindmapNodeArgsSchema.safeParse(args);
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for get_mindmap_node: ${parsed.error}`);
                }
                const { fileId, nodeId, includeSiblings } = parsed.data;
                const document = await loadDocument(context, fileId);
                const nodeContext = findNodeContext(document, nodeId, includeSiblings);
                if (!nodeContext) {
                    throw new Error(`Node with ID '${nodeId}' not found in mindmap`);
                }
                return textResult(formatNodeContext(document, nodeContext));
            }

            case "get_chunked_mindmap_content": {
                const parsed = GetChunkedMindmapContentArgsSchema.safeParse(args);
                if (!parsed.success) {
                    throw new Error(`Invalid arguments for get_chunked_mindmap_content: ${parsed.error}`);
                }
                const { fileId, chunkSize } = parsed.data;
                const document = await loadDocument(context, fileId);
                const chunks = chunkTitles(collectTitles(document), chunkSize);
                return textResult(formatChunks(document, chunks, chunkSize));
            }

            default:
                throw new Error(`Unknown tool: ${name}`);
        }
    } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.error(`Tool ${name} failed: ${errorMessage}`);
        return {
            content: [{ type: "text", text: `Error: ${errorMessage}` }],
            isError: true,
        };
    }
}
