import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, type AppConfig } from "./config.js";
import { createServer } from "./server.js";
import { PROJECT_MAP } from "./testing/fixtures.js";
import { MemoryDrive } from "./testing/memory-drive.js";

function sampleDrive(): MemoryDrive {
    return new MemoryDrive()
        .addFolder("folder-1", "Plans")
        .addJson("map-1", "project.mup", PROJECT_MAP, "folder-1")
        .add({ id: "broken", name: "broken.mup", content: "{not json" });
}

function readResult(result: unknown): { text: string; isError: boolean } {
    const parsed = CallToolResultSchema.parse(result);
    const [first] = parsed.content;
    if (first?.type !== "text") {
        throw new Error("Expected a text result");
    }
    return { text: first.text, isError: parsed.isError ?? false };
}

describe("MCP server", () => {
    let client: Client | undefined;

    async function connect(drive: MemoryDrive = sampleDrive(), config: Readonly<AppConfig> = DEFAULT_CONFIG) {
        const server = createServer({ drive, config });
        const connected = new Client({ name: "test-client", version: "1.0.0" });
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await Promise.all([connected.connect(clientTransport), server.connect(serverTransport)]);
        client = connected;
        return connected;
    }

    async function call(name: string, args: Record<string, unknown> = {}, config?: Readonly<AppConfig>) {
        const connected = await connect(sampleDrive(), config);
        return readResult(await connected.callTool({ name, arguments: args }));
    }

    async function callJson(name: string, args: Record<string, unknown> = {}, config?: Readonly<AppConfig>) {
        const result = await call(name, args, config);
        expect(result.isError).toBe(false);
        return JSON.parse(result.text);
    }

    afterEach(async () => {
        await client?.close();
        client = undefined;
    });

    it("lists every tool", async () => {
        const connected = await connect();
        const { tools } = await connected.listTools();

        expect(tools.map(tool => tool.name)).toEqual([
            "list_gdrive_files",
            "list_accessible_folders",
            "search_mindmaps",
            "get_mindmap_content",
            "search_and_parse_mindmaps",
            "search_mindmap_content",
            "search_mindmap_nodes",
            "get_mindmap_node",
            "get_chunked_mindmap_content",
        ]);
        expect(tools.every(tool => tool.inputSchema.type === "object")).toBe(true);
    });

    it("lists Drive files", async () => {
        const result = await callJson("list_gdrive_files", { maxResults: 2 });

        expect(result.count).toBe(2);
        expect(result.files.map((file: { id: string }) => file.id)).toEqual(["folder-1", "map-1"]);
    });

    it("lists folders", async () => {
        const result = await callJson("list_accessible_folders");

        expect(result.count).toBe(1);
        expect(result.folders[0]).toMatchObject({ id: "folder-1", name: "Plans" });
    });

    it("finds MindMup files in a folder", async () => {
        const result = await callJson("search_mindmaps", { folderId: "folder-1" });

        expect(result.files.map((file: { name: string }) => file.name)).toEqual(["project.mup"]);
    });

    it("returns a parsed mind map with its text", async () => {
        const result = await callJson("get_mindmap_content", { fileId: "map-1" });

        expect(result.title).toBe("Project");
        expect(result.name).toBe("project.mup");
        expect(result.nodeCount).toBe(5);
        expect(result.root.children[0].children[0].title).toBe("Step A");
        expect(result.allTextContent).toBe("Project Test Case 1 Step A Test Case 2 Notes");
        expect(result.contentTruncated).toBe(false);
    });

    it("cuts the text at the configured length", async () => {
        const result = await callJson("get_mindmap_content", { fileId: "map-1" }, { ...DEFAULT_CONFIG, maxContentLength: 10 });

        expect(result.allTextContent).toBe("Project Te");
        expect(result.contentTruncated).toBe(true);
        expect(result.originalContentLength).toBe(44);
    });

    it("parses every discovered file and reports failures per file", async () => {
        const result = await callJson("search_and_parse_mindmaps");

        expect(result.count).toBe(2);
        expect(result.failedCount).toBe(1);
        expect(result.results[0]).toMatchObject({
            fileId: "map-1",
            title: "Project",
            nodeCount: 5,
            preview: "Project Test Case 1 Step A Test Case 2 Notes",
        });
        expect(result.results[1]).toMatchObject({ fileId: "broken", error: { code: "PARSE_ERROR" } });
    });

    it("searches titles in one file", async () => {
        const result = await callJson("search_mindmap_content", { fileId: "map-1", keyword: "step" });

        expect(result.totalMatches).toBe(1);
        expect(result.caseSensitive).toBe(false);
        expect(result.matches[0].path).toBe("Project > Test Case 1 > Step A");
    });

    it("searches nodes across files and keeps partial failures", async () => {
        const result = await callJson("search_mindmap_nodes", {
            fileIds: ["map-1", "broken", "missing"],
            titleContains: "test case",
        });

        expect(result.query).toEqual({ titleContains: "test case", caseSensitive: false });
        expect(result.totalMatches).toBe(2);
        expect(result.failedDocuments).toBe(2);
        expect(result.results[0].matches.map((match: { title: string }) => match.title)).toEqual([
            "Test Case 1",
            "Test Case 2",
        ]);
        expect(result.results[1].error.code).toBe("PARSE_ERROR");
        expect(result.results[2].error).toEqual({
            code: "NOT_FOUND",
            message: "File not found: missing",
            details: { fileId: "missing" },
        });
    });

    it("searches nodes by attribute within a folder", async () => {
        const result = await callJson("search_mindmap_nodes", {
            folderId: "folder-1",
            attributeEquals: { key: "status", value: "done" },
        });

        expect(result.results).toHaveLength(1);
        expect(result.results[0].matches[0].title).toBe("Notes");
    });

    it("returns a node with its context", async () => {
        const result = await callJson("get_mindmap_node", { fileId: "map-1", nodeId: "root/1", includeSiblings: true });

        expect(result.node.path).toBe("Project > Test Case 1");
        expect(result.parent).toEqual({ id: "root", title: "Project" });
        expect(result.siblings.map((node: { title: string }) => node.title)).toEqual(["Test Case 2", "Notes"]);
    });

    it("reports an unknown node", async () => {
        const result = await call("get_mindmap_node", { fileId: "map-1", nodeId: "nope" });

        expect(result).toEqual({ text: "Error: Node with ID 'nope' not found in mindmap", isError: true });
    });

    it("returns the titles in chunks", async () => {
        const result = await callJson("get_chunked_mindmap_content", { fileId: "map-1", chunkSize: 2 });

        expect(result.totalNodes).toBe(5);
        expect(result.totalChunks).toBe(3);
        expect(result.chunks[2].content).toBe("Notes");
    });

    it("reports a missing file", async () => {
        const result = await call("get_mindmap_content", { fileId: "missing" });

        expect(result).toEqual({ text: "Error: File not found: missing", isError: true });
    });

    it("reports a file that does not parse", async () => {
        const result = await call("get_mindmap_content", { fileId: "broken" });

        expect(result.isError).toBe(true);
        expect(result.text).toMatch(/^Error: Invalid JSON: /);
    });

    it("rejects invalid arguments", async () => {
        const result = await call("get_mindmap_content", {});

        expect(result.isError).toBe(true);
        expect(result.text).toMatch(/^Error: Invalid arguments for get_mindmap_content: /);
    });

    it("rejects an unknown tool", async () => {
        const result = await call("draw_mindmap");

        expect(result).toEqual({ text: "Error: Unknown tool: draw_mindmap", isError: true });
    });
});
