import type { TreeNode } from "./node.js";

export interface TextSink {
  write(chunk: string): unknown;
}

export const EMPTY_TREE_MARKER = "[empty tree]";
export const NULL_MARKER = "[null]";

const STEM = "|";
const BRANCH = "_ ";

/** Append-only in-memory sink, used by `toString()` and tests. */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

export type RenderOptions<T> = {
  format: (data: T) => string;
  /** Emit `Depth: <d> Data: <payload>` per visited entry instead of the diagram. */
  trace?: boolean;
};

type RenderEntry<T> = {
  // null for a tombstone slot
  node: TreeNode<T> | null;
  depth: number;
  margin: boolean[];
  trailing: boolean[];
};

/** Payload text for a node, or `[null]` for a tombstone or a null/undefined payload. */
export function formatPayload<T>(node: TreeNode<T> | null, format: (data: T) => string): string {
  if (node === null || node.data === null || node.data === undefined) return NULL_MARKER;
  return format(node.data);
}

function marginRows(margin: readonly boolean[]): string {
  let out = "";
  for (let row = 1; row <= 2; row++) {
    margin.forEach((showStem, idx) => {
      const glyph = showStem ? STEM : " ";
      if (idx < margin.length - 1) {
        out += `${glyph}  `;
      } else if (row === 2) {
        out += `${glyph}${BRANCH}`;
      } else {
        // no trailing padding on the connector row
        out += showStem ? `${glyph}\n` : "\n";
      }
    });
  }
  return out;
}

/**
 * Write a vertical diagram of the tree under `root` to `sink`.
 *
 * Pre-order, left to right, driven by an explicit stack so deep trees never grow the call
 * stack. Each node gets two rows: a connector row and a label row. The glyph columns come
 * from the parent's trailing margin: a column keeps its stem while a sibling is still to be
 * printed below it.
 */
export function renderTree<T>(root: TreeNode<T> | null, sink: TextSink, opts: RenderOptions<T>): void {
  if (root === null) {
    sink.write(`${EMPTY_TREE_MARKER}\n`);
    return;
  }

  const stack: RenderEntry<T>[] = [{ node: root, depth: 0, margin: [], trailing: [] }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const { node, depth, trailing } = entry;

    if (opts.trace) {
      sink.write(`Depth: ${depth} Data: ${formatPayload(node, opts.format)}\n`);
    } else {
      sink.write(`${marginRows(entry.margin)}${formatPayload(node, opts.format)}\n`);
    }

    if (node === null) continue;
    const slots = node.children;
    for (let i = slots.length - 1; i >= 0; i--) {
      const slot = slots[i];
      if (!slot) continue;
      const rightmost = i === slots.length - 1;
      stack.push({
        node: slot.kind === "live" ? slot.node : null,
        depth: depth + 1,
        margin: [...trailing, true],
        trailing: [...trailing, !rightmost],
      });
    }
  }
}
