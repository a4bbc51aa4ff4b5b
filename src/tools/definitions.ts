import type { Tool } from "@modelcontextprotocol/sdk/types.js";
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
    toolInputSchema,
} from "./schemas.js";

export const TOOLS: Tool[] = [
    {
        name: "list_gdrive_files",
        description: `List files in Google Drive, most recently modified first:
                - Filter by MIME type, by a fragment of the file name, or by parent folder
                - Trashed files are never listed
                Input: {
                    maxResults: Number of files to return (1-1000, default 10),
                    fileType: MIME type (optional),
                    nameContains: Text the file name must contain (optional),
                    folderId: Parent folder ID (optional)
                }
                Output: { files, count }`,
        inputSchema: toolInputSchema(ListGdriveFilesArgsSchema),
    },
    {
        name: "list_accessible_folders",
        description: `List the Google Drive folders the service account can see.
                Use a folder ID from here to scope "search_mindmaps" or "search_mindmap_nodes".
                Output: { folders, count }`,
        inputSchema: toolInputSchema(ListAccessibleFoldersArgsSchema),
    },
    {
        name: "search_mindmaps",
        description: `Find MindMup mind map files in Google Drive:
                - Recognizes .mup files, the MindMup MIME type, and JSON files named like mind maps
                - With a folder ID, searches that folder and all of its subfolders
                - Without one, searches the whole Drive
                - nameContains keeps matching names, names starting with it first
                Output: { files, count }`,
        inputSchema: toolInputSchema(SearchMindmapsArgsSchema),
    },
    {
        name: "get_mindmap_content",
        description: `Load and parse one MindMup file:
                - Complete node tree with IDs, titles and attributes
                - Node count, depth, and format version
                - All node titles joined as plain text (cut at the configured content limit)
                Input: { fileId: Google Drive file ID }
                Output: Parsed mind map in JSON format`,
        inputSchema: toolInputSchema(GetMindmapContentArgsSchema),
    },
    {
        name: "search_and_parse_mindmaps",
        description: `Find MindMup files and parse them all in one call:
                - Same discovery rules as "search_mindmaps"
                - Per file: title, node count, full text and a 500 character preview
                - A file that fails to load or parse is reported with its error, the others still come back
                Output: { results, count, failedCount }`,
        inputSchema: toolInputSchema(SearchAndParseMindmapsArgsSchema),
    },
    {
        name: "search_mindmap_content",
        description: `Search node titles inside one MindMup file:
                - Substring match, case-insensitive unless caseSensitive is set
                - Each match carries its path from the root, e.g. "Root > Branch > Node"
                Note: Use "get_mindmap_node" with a match's ID for its parent, children and siblings
                Input: {
                    fileId: Google Drive file ID,
                    keyword: Text to look for,
                    caseSensitive: Boolean (optional)
                }
                Output: Matching nodes in document order`,
        inputSchema: toolInputSchema(SearchMindmapContentArgsSchema),
    },
    {
        name: "search_mindmap_nodes",
        description: `Search nodes across many MindMup files with combined criteria:
                - titleContains: substring of the node title
                - attributeEquals: { key, value } an attribute must equal exactly
                - maxDepth: ignore nodes deeper than this (the root is depth 0)
                - Every given criterion must match; with none, every node matches
                - Searches the listed fileIds, or the MindMup files in folderId, or the whole Drive
                - Files that fail to load are reported next to the results of the others
                Output: { query, results, totalMatches, failedDocuments }`,
        inputSchema: toolInputSchema(SearchMindmapNodesArgsSchema),
    },
    {
        name: "get_mindmap_node",
        description: `Get one node of a MindMup file with its surroundings:
                - Node title, depth, attributes, and path from the root
                - Parent and direct children
                - Siblings when includeSiblings is true
                Input: {
                    fileId: Google Drive file ID,
                    nodeId: Node ID as returned by the search tools,
                    includeSiblings: Boolean (optional)
                }`,
        inputSchema: toolInputSchema(GetMindmapNodeArgsSchema),
    },
    {
        name: "get_chunked_mindmap_content",
        description: `Read a large MindMup file in pieces:
                - Node titles in document order, grouped into chunks of chunkSize nodes (default 50)
                - Each chunk lists its first and last node index and its joined text
                Output: { totalNodes, totalChunks, chunks }`,
        inputSchema: toolInputSchema(GetChunkedMindmapContentArgsSchema),
    },
];
