import { buildDocument } from "../mindmup/builder.js";
import type { MindmapDocument } from "../mindmup/model.js";

export const TEST_LIMITS = { maxDepth: 256, maxDocumentBytes: 1_000_000 };

// Pre-order: Project, Test Case 1, Step A, Test Case 2, Notes.
export const PROJECT_MAP = {
    title: "Project",
    formatVersion: 3,
    ideas: {
        "1": {
            title: "Test Case 1",
            attr: { status: "open" },
            ideas: {
                "1": { title: "Step A", attr: { meta: { owner: "qa", tags: ["smoke", "ui"] } } },
            },
        },
        "2": { title: "Test Case 2", attr: { status: "open" } },
        "3": { title: "Notes", attr: { status: "done" } },
    },
};

export function buildFixture(value: unknown, sourceId: string = "doc-1"): MindmapDocument {
    return buildDocument(JSON.stringify(value), { sourceId, limits: TEST_LIMITS });
}
