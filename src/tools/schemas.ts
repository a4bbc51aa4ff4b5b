import { ToolSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { JsonValue } from "../mindmup/model.js";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ])
);

const FileId = z.string().min(1).describe("Google Drive file ID");

export const ListGdriveFilesArgsSchema = z.object({
    maxResults: z.number().int().min(1).max(1000).default(10),
    fileType: z.string().min(1).optional().describe("MIME type to filter by, e.g. application/json"),
    nameContains: z.string().min(1).optional(),
    folderId: z.string().min(1).optional(),
});

export const ListAccessibleFoldersArgsSchema = z.object({
    maxResults: z.number().int().min(1).max(1000).default(100),
});

export const SearchMindmapsArgsSchema = z.object({
    folderId: z.string().min(1).optional().describe("Restrict the search to this folder and its subfolders"),
    nameContains: z.string().min(1).optional(),
});

export const GetMindmapContentArgsSchema = z.object({
    fileId: FileId,
});

export const SearchAndParseMindmapsArgsSchema = SearchMindmapsArgsSchema;

export const SearchMindmapContentArgsSchema = z.object({
    fileId: FileId,
    keyword: z.string().min(1),
    caseSensitive: z.boolean().optional(),
});

export const SearchMindmapNodesArgsSchema = z.object({
    fileIds: z.array(FileId).min(1).max(50).optional(),
    folderId: z.string().min(1).optional(),
    titleContains: z.string().optional(),
    attributeEquals: z
        .object({
            key: z.string().min(1),
            value: JsonValueSchema,
        })
        .optional(),
    maxDepth: z.number().int().min(0).optional(),
    caseSensitive: z.boolean().optional(),
});

export const GetMindmapNodeArgsSchema = z.object({
    fileId: FileId,
    nodeId: z.string().min(1),
    includeSiblings: z.boolean().default(false),
});

export const GetChunkedMindmapContentArgsSchema = z.object({
    fileId: FileId,
    chunkSize: z.number().int().min(1).max(1000).default(50),
});

const ToolInputSchema = ToolSchema.shape.inputSchema;

export function toolInputSchema(schema: z.ZodTypeAny): Tool["inputSchema"] {
    return ToolInputSchema.parse(zodToJsonSchema(schema));
}
