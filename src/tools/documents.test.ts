import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../config.js";
import { DocumentTooLarge } from "../errors.js";
import { PROJECT_MAP } from "../testing/fixtures.js";
import { MemoryDrive } from "../testing/memory-drive.js";
import { loadDocument, loadOutcome, loadOutcomes } from "./documents.js";

// Records how many downloads run at once.
class CountingDrive extends MemoryDrive {
    fetches = 0;
    active = 0;
    peak = 0;

    async fetchBytes(fileId: string): Promise<Uint8Array> {
        this.fetches++;
        this.active++;
        this.peak = Math.max(this.peak, this.active);
        try {
            await new Promise(resolve => setTimeout(resolve, 0));
            return await super.fetchBytes(fileId);
        } finally {
            this.active--;
        }
    }
}

describe("document loading", () => {
    beforeEach(() => {
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("refuses an oversized file before downloading it", async () => {
        const drive = new CountingDrive().add({ id: "big", name: "big.mup", content: "x".repeat(5000) });
        const context = { drive, config: { ...DEFAULT_CONFIG, maxDocumentBytes: 100 } };

        await expect(loadDocument(context, "big")).rejects.toThrow(DocumentTooLarge);
        const outcome = await loadOutcome(context, "big");
        const listed = await loadOutcome(context, await drive.getFile("big"));

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error).toBeInstanceOf(DocumentTooLarge);
        expect(outcome.error).toMatchObject({ details: { size: 5000, limit: 100 } });
        expect(listed.ok).toBe(false);
        expect(drive.fetches).toBe(0);
    });

    it("downloads a file within the limit", async () => {
        const drive = new CountingDrive().addJson("map-1", "project.mup", PROJECT_MAP);

        const document = await loadDocument({ drive, config: DEFAULT_CONFIG }, "map-1");

        expect(document.root.title).toBe("Project");
        expect(document.metadata.name).toBe("project.mup");
        expect(drive.fetches).toBe(1);
    });

    it("loads one file at a time and keeps the order", async () => {
        const drive = new CountingDrive();
        const ids: string[] = [];
        for (let i = 0; i < 20; i++) {
            drive.addJson(`map-${i}`, `map ${i}.mup`, { title: `Map ${i}` });
            ids.push(`map-${i}`);
        }
        ids.push("missing");

        const outcomes = await loadOutcomes({ drive, config: DEFAULT_CONFIG }, ids);

        expect(drive.peak).toBe(1);
        expect(drive.fetches).toBe(20);
        expect(outcomes.map(outcome => (outcome.ok ? outcome.document.sourceId : outcome.sourceId))).toEqual(ids);
        expect(outcomes.map(outcome => outcome.ok)).toEqual([...Array<boolean>(20).fill(true), false]);
    });
});
