import type { MindmapDocument, MindmapNode } from "./model.js";

/** Pre-order, depth-first. Uses an explicit stack, so tree height never touches the call stack. */
export function* walk(root: MindmapNode): Generator<MindmapNode> {
    const stack: MindmapNode[] = [root];
    while (stack.length > 0) {
        const node = stack.pop();
        if (!node) break;
        yield node;
        for (let i = node.children.length - 1; i >= 0; i--) {
            stack.push(node.children[i]);
        }
    }
}

export function countNodes(document: MindmapDocument): number {
    let count = 0;
    for (const _node of walk(document.root)) count++;
    return count;
}

// Number of levels: a root without children has a depth of 1.
export function maxDepth(document: MindmapDocument): number {
    let deepest = 0;
    for (const node of walk(document.root)) {
        deepest = Math.max(deepest, node.depth + 1);
    }
    return deepest;
}

export function collectTitles(document: MindmapDocument): string[] {
    return Array.from(walk(document.root), node => node.title);
}

export function ancestorsOf(node: MindmapNode): MindmapNode[] {
    const ancestors: MindmapNode[] = [];
    for (let current = node.parent; current; current = current.parent) {
        ancestors.unshift(current);
    }
    return ancestors;
}

export function getNodePath(node: MindmapNode): string {
    return [...ancestorsOf(node), node].map(item => item.title).join(" > ");
}

export function findNode(document: MindmapDocument, nodeId: string): MindmapNode | undefined {
    for (const node of walk(document.root)) {
        if (node.id === nodeId) return node;
    }
    return undefined;
}

export interface NodeContext {
    node: MindmapNode;
    parent?: MindmapNode;
    children: readonly MindmapNode[];
    siblings?: MindmapNode[];
}

export function findNodeContext(
    document: MindmapDocument,
    nodeId: string,
    includeSiblings: boolean = false
): NodeContext | undefined {
    const node = findNode(document, nodeId);
    if (!node) return undefined;

    const context: NodeContext = { node, children: node.children };
    if (node.parent) context.parent = node.parent;
    if (includeSiblings) {
        context.siblings = (node.parent?.children ?? []).filter(sibling => sibling !== node);
    }
    return context;
}

export interface TitleChunk {
    chunkId: number;
    startNode: number;
    endNode: number;
    nodeCount: number;
    content: string;
    contentLength: number;
}

export function chunkTitles(titles: readonly string[], chunkSize: number): TitleChunk[] {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
        throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
    const chunks: TitleChunk[] = [];
    for (let start = 0; start < titles.length; start += chunkSize) {
        const slice = titles.slice(start, start + chunkSize);
        const content = slice.join(" ");
        chunks.push({
            chunkId: start / chunkSize,
            startNode: start,
            endNode: start + slice.length - 1,
            nodeCount: slice.length,
            content,
            contentLength: content.length,
        });
    }
    return chunks;
}

export interface TruncatedContent {
    content: string;
    truncated: boolean;
    originalLength: number;
}

export function truncateContent(content: string, maxLength: number): TruncatedContent {
    const originalLength = content.length;
    if (originalLength <= maxLength) {
        return { content, truncated: false, originalLength };
    }
    return { content: content.slice(0, maxLength), truncated: true, originalLength };
}
