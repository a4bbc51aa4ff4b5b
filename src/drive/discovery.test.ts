import { describe, expect, it, vi } from "vitest";
import { PermissionDenied } from "../errors.js";
import { MemoryDrive } from "../testing/memory-drive.js";
import { discoverMindmups } from "./discovery.js";
import { MimeType } from "./query.js";

const names = (files: Array<{ name: string }>) => files.map(file => file.name);

describe("discoverMindmups", () => {
    it("scans a folder and its subfolders", async () => {
        const drive = new MemoryDrive()
            .addFolder("top", "Projects")
            .addFolder("sub", "Archive", "top")
            .add({ id: "a", name: "alpha.mup", parents: ["top"] })
            .add({ id: "b", name: "beta.mup", parents: ["sub"] })
            .add({ id: "c", name: "readme.txt", mimeType: MimeType.TEXT, parents: ["top"] })
            .add({ id: "d", name: "elsewhere.mup", parents: ["other"] });

        const files = await discoverMindmups(drive, { folderScope: "top" });

        expect(names(files)).toEqual(["alpha.mup", "beta.mup"]);
    });

    it("lists a folder reachable twice only once", async () => {
        const drive = new MemoryDrive()
            .addFolder("top", "Projects")
            .add({ id: "shared", name: "Shared", mimeType: MimeType.FOLDER, parents: ["top", "top"] })
            .add({ id: "a", name: "alpha.mup", parents: ["shared"] });

        await discoverMindmups(drive, { folderScope: "top" });

        expect(drive.queries.map(query => query.folderId)).toEqual(["top", "shared"]);
    });

    it("keeps going when a subfolder cannot be listed", async () => {
        const drive = new MemoryDrive()
            .addFolder("top", "Projects")
            .addFolder("locked", "Locked", "top")
            .add({ id: "a", name: "alpha.mup", parents: ["top"] })
            .failWith("locked", new PermissionDenied("locked"));

        expect(names(await discoverMindmups(drive, { folderScope: "top" }))).toEqual(["alpha.mup"]);
    });

    it("fails when the starting folder cannot be listed", async () => {
        const drive = new MemoryDrive().failWith("top", new PermissionDenied("top"));

        await expect(discoverMindmups(drive, { folderScope: "top" })).rejects.toThrow(PermissionDenied);
    });

    it("searches the whole Drive and removes duplicates", async () => {
        const drive = new MemoryDrive()
            .add({ id: "a", name: "team mindmap.mup" })
            .add({ id: "b", name: "Plan", mimeType: MimeType.MINDMUP })
            .add({ id: "c", name: "mindmup export.json", mimeType: MimeType.JSON })
            .add({ id: "d", name: "budget.xlsx" });

        const files = await discoverMindmups(drive);

        expect(drive.queries.map(query => query.text ?? query.mimeTypes?.join())).toEqual([
            "mindmup",
            "mindmap",
            ".mup",
            MimeType.MINDMUP,
        ]);
        expect(files.map(file => file.id)).toEqual(["c", "a", "b"]);
    });

    it("filters and ranks by name", async () => {
        const drive = new MemoryDrive()
            .addFolder("top", "Projects")
            .add({ id: "1", name: "Roadmap.mup", parents: ["top"] })
            .add({ id: "2", name: "map of teams.mup", parents: ["top"] })
            .add({ id: "3", name: "Retro.mup", parents: ["top"] });

        const files = await discoverMindmups(drive, { folderScope: "top", nameFilter: "map" });

        expect(names(files)).toEqual(["map of teams.mup", "Roadmap.mup"]);
    });

    it("warns when a folder listing reaches the page cap", async () => {
        const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
        const drive = new MemoryDrive().addFolder("top", "Projects");
        for (let i = 0; i < 1000; i++) {
            drive.add({ id: `f${i}`, name: `map ${i}.mup`, parents: ["top"] });
        }

        try {
            const files = await discoverMindmups(drive, { folderScope: "top" });

            expect(files).toHaveLength(1000);
            expect(stderr).toHaveBeenCalledWith(
                expect.stringContaining("WARN [discovery] Folder top listing stopped at 1000 entries")
            );
        } finally {
            stderr.mockRestore();
        }
    });
});
