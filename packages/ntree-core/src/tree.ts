import {
  InvalidOperationError,
  InvalidStateError,
  InvariantViolationError,
  isRecoverableTreeError,
  type TreeResult,
} from "./errors.js";
import { TreeNode, type ChildSlot, type NodeContext } from "./node.js";
import { destroyNode, nodeToken, replaceChildren, tombstoneChild } from "./internal.js";
import { formatPayload, renderTree, StringSink, type TextSink } from "./render.js";

export type GenericTreeOptions<T> = {
  /** Emit deletion traces through `log`, and a depth/data trace from `print` instead of the diagram. */
  debug?: boolean;
  log?: (line: string) => void;
  /** Copies a payload into a new node. Defaults to `structuredClone`. */
  copy?: (data: T) => T;
  /** Payload text for `print` and traces. Defaults to `String`. */
  format?: (data: T) => string;
};

export class GenericTree<T> {
  showDebugMessages: boolean;
  private root: TreeNode<T> | null = null;
  private readonly ctx: NodeContext<T>;
  private readonly log: (line: string) => void;
  private readonly format: (data: T) => string;

  constructor(opts: GenericTreeOptions<T> = {}) {
    this.showDebugMessages = Boolean(opts.debug);
    this.log = opts.log ?? ((line) => console.debug(line));
    this.format = opts.format ?? ((data) => String(data));
    this.ctx = { copy: opts.copy ?? ((data) => structuredClone(data)) };
  }

  static withRoot<T>(data: T, opts: GenericTreeOptions<T> = {}): GenericTree<T> {
    const tree = new GenericTree<T>(opts);
    tree.createRoot(data);
    return tree;
  }

  getRoot(): TreeNode<T> | null {
    return this.root;
  }

  isEmpty(): boolean {
    return this.root === null;
  }

  createRoot(data: T): TreeNode<T> {
    if (this.root !== null) {
      throw new InvalidStateError("tried to createRoot when root already exists");
    }
    this.root = new TreeNode(nodeToken, this.ctx, data, null);
    return this.root;
  }

  tryCreateRoot(data: T): TreeResult<TreeNode<T>> {
    return this.attempt(() => this.createRoot(data));
  }

  /**
   * Remove `target` and its whole subtree. A `null`/`undefined` target is a no-op.
   *
   * The parent's slot for `target` becomes a tombstone rather than being spliced out, so
   * sibling indices stay stable until `compress()` runs. The subtree is first collected with
   * an explicit stack and only then torn down, deepest-discovered first.
   */
  deleteSubtree(target: TreeNode<T> | null | undefined): void {
    if (target === null || target === undefined) return;

    this.assertOwned(target);
    const targetingRoot = target === this.root;

    const parent = target.parent;
    if (parent !== null && !parent[tombstoneChild](target)) {
      throw new InvariantViolationError("target node to delete was not listed as a child of its parent");
    }

    const toExplore: (TreeNode<T> | null)[] = [target];
    const toDelete: TreeNode<T>[] = [];
    while (toExplore.length > 0) {
      const node = toExplore.pop() ?? null;
      if (this.showDebugMessages) this.log(`Exploring node: ${formatPayload(node, this.format)}`);
      // Tombstones carry nothing to delete.
      if (node === null) continue;

      toDelete.push(node);
      for (const slot of node.children) {
        toExplore.push(slot.kind === "live" ? slot.node : null);
      }
    }

    while (toDelete.length > 0) {
      const node = toDelete.pop();
      if (!node) break;
      if (this.showDebugMessages) this.log(`Deleting node: ${formatPayload(node, this.format)}`);
      node[destroyNode]();
    }

    if (targetingRoot) this.root = null;
  }

  tryDeleteSubtree(target: TreeNode<T> | null | undefined): TreeResult<void> {
    return this.attempt(() => this.deleteSubtree(target));
  }

  clear(): void {
    this.deleteSubtree(this.root);
    if (this.root !== null) {
      throw new InvariantViolationError("clear() detected that deleteSubtree() had not reset the root");
    }
  }

  /**
   * Drop every tombstone slot, breadth-first from the root. Live order is preserved.
   */
  compress(): void {
    if (this.root === null) return;

    const queue: (TreeNode<T> | null)[] = [this.root];
    let head = 0;
    while (head < queue.length) {
      const node = queue[head++] ?? null;
      if (node === null) {
        // only live children are ever enqueued
        throw new InvariantViolationError("compression exploration queued a tombstone");
      }

      const compacted: ChildSlot<T>[] = [];
      for (const slot of node.children) {
        if (slot.kind !== "live") continue;
        compacted.push(slot);
        queue.push(slot.node);
      }
      node[replaceChildren](compacted);
    }
  }

  nodeCount(): number {
    if (this.root === null) return 0;
    let count = 0;
    const stack: TreeNode<T>[] = [this.root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      count += 1;
      stack.push(...node.liveChildren());
    }
    return count;
  }

  print<S extends TextSink>(sink: S): S {
    renderTree(this.root, sink, { format: this.format, trace: this.showDebugMessages });
    return sink;
  }

  toString(): string {
    return this.print(new StringSink()).toString();
  }

  private assertOwned(target: TreeNode<T>): void {
    if (target.destroyed) {
      throw new InvalidOperationError("tried to delete a node that was already destroyed");
    }
    let ancestor = target;
    while (ancestor.parent !== null) ancestor = ancestor.parent;
    if (ancestor !== this.root) {
      throw new InvalidOperationError("tried to delete a node from a different tree");
    }
  }

  private attempt<V>(fn: () => V): TreeResult<V> {
    try {
      return { ok: true, value: fn() };
    } catch (err) {
      if (isRecoverableTreeError(err)) return { ok: false, error: err };
      throw err;
    }
  }
}
