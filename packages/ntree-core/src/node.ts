import { InvalidStateError } from "./errors.js";
import { destroyNode, nodeToken, replaceChildren, tombstoneChild } from "./internal.js";

/**
 * One entry in a node's ordered child sequence.
 *
 * A `tombstone` marks a slot whose child was deleted and has not been compacted yet; it
 * holds no node reference.
 */
export type ChildSlot<T> =
  | { readonly kind: "live"; readonly node: TreeNode<T> }
  | { readonly kind: "tombstone" };

export const TOMBSTONE = Object.freeze({ kind: "tombstone" as const });

export type NodeContext<T> = {
  copy: (data: T) => T;
};

export class TreeNode<T> {
  private slots: ChildSlot<T>[] = [];
  private parentNode: TreeNode<T> | null;
  private isDestroyed = false;
  readonly data: T;

  /** Nodes come from `GenericTree.createRoot` or `TreeNode.addChild`. */
  constructor(
    token: typeof nodeToken,
    private readonly ctx: NodeContext<T>,
    data: T,
    parent: TreeNode<T> | null
  ) {
    if (token !== nodeToken) throw new InvalidStateError("nodes are created through a tree");
    this.data = ctx.copy(data);
    this.parentNode = parent;
  }

  get parent(): TreeNode<T> | null {
    return this.parentNode;
  }

  get children(): readonly ChildSlot<T>[] {
    return this.slots;
  }

  get destroyed(): boolean {
    return this.isDestroyed;
  }

  /** Live children in slot order, skipping tombstones. */
  liveChildren(): TreeNode<T>[] {
    const out: TreeNode<T>[] = [];
    for (const slot of this.slots) {
      if (slot.kind === "live") out.push(slot.node);
    }
    return out;
  }

  /**
   * Append a rightmost child holding a copy of `data`.
   *
   * Tombstoned slots are not reused: the new child lands after them until the owning tree
   * is compacted.
   */
  addChild(data: T): TreeNode<T> {
    if (this.isDestroyed) throw new InvalidStateError("cannot add a child to a destroyed node");
    const child = new TreeNode(nodeToken, this.ctx, data, this);
    this.slots.push(Object.freeze({ kind: "live" as const, node: child }));
    return child;
  }

  /** Replace the live slot holding `child` with a tombstone. */
  [tombstoneChild](child: TreeNode<T>): boolean {
    const idx = this.slots.findIndex((slot) => slot.kind === "live" && slot.node === child);
    if (idx === -1) return false;
    this.slots[idx] = TOMBSTONE;
    return true;
  }

  [replaceChildren](slots: readonly ChildSlot<T>[]): void {
    this.slots = [...slots];
  }

  [destroyNode](): void {
    this.slots = [];
    this.parentNode = null;
    this.isDestroyed = true;
  }
}
