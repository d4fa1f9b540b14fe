import { expect, test } from "vitest";

import {
  GenericTree,
  InvalidOperationError,
  InvariantViolationError,
  type TreeNode,
} from "../src/index.js";
import * as publicApi from "../src/index.js";
import { replaceChildren } from "../src/internal.js";

function buildABC() {
  const lines: string[] = [];
  const tree = new GenericTree<string>({ log: (line) => lines.push(line) });
  const a = tree.createRoot("A");
  const b = a.addChild("B");
  const c = a.addChild("C");
  return { tree, a, b, c, lines };
}

test("deleteSubtree: leaf becomes a tombstone without shifting siblings", () => {
  const { tree, a, b, c } = buildABC();
  tree.deleteSubtree(b);

  expect(a.children).toEqual([{ kind: "tombstone" }, { kind: "live", node: c }]);
  expect(a.liveChildren()).toEqual([c]);
  expect(b.destroyed).toBe(true);
  expect(b.parent).toBeNull();
  expect(tree.nodeCount()).toBe(2);
});

test("deleteSubtree: destroys every descendant of the target", () => {
  const { tree, a, b, c } = buildABC();
  const b1 = b.addChild("B1");
  const b2 = b.addChild("B2");
  const b11 = b1.addChild("B11");

  tree.deleteSubtree(b);

  for (const node of [b, b1, b2, b11]) {
    expect(node.destroyed).toBe(true);
    expect(node.children).toEqual([]);
  }
  expect(c.destroyed).toBe(false);
  expect(a.destroyed).toBe(false);
  expect(tree.nodeCount()).toBe(2);
});

test("deleteSubtree: deleting the root empties the tree; null is then a no-op", () => {
  const { tree, a, b, c } = buildABC();
  tree.deleteSubtree(a);

  expect(tree.getRoot()).toBeNull();
  expect(tree.isEmpty()).toBe(true);
  expect(tree.nodeCount()).toBe(0);
  expect([a, b, c].every((n) => n.destroyed)).toBe(true);

  tree.deleteSubtree(tree.getRoot());
  tree.deleteSubtree(null);
  tree.deleteSubtree(undefined);
  expect(tree.isEmpty()).toBe(true);
  expect(tree.toString()).toBe("[empty tree]\n");
});

test("deleteSubtree: node from a different tree fails and mutates neither tree", () => {
  const first = buildABC();
  const second = buildABC();
  const firstBefore = first.tree.toString();
  const secondBefore = second.tree.toString();

  expect(() => first.tree.deleteSubtree(second.b)).toThrow(InvalidOperationError);
  expect(() => first.tree.deleteSubtree(second.a)).toThrow("tried to delete a node from a different tree");

  expect(first.tree.toString()).toBe(firstBefore);
  expect(second.tree.toString()).toBe(secondBefore);
  expect(second.b.destroyed).toBe(false);
  expect(second.a.children.every((slot) => slot.kind === "live")).toBe(true);
});

test("deleteSubtree: an already destroyed node is rejected", () => {
  const { tree, b } = buildABC();
  tree.deleteSubtree(b);

  expect(() => tree.deleteSubtree(b)).toThrow(InvalidOperationError);
  expect(() => tree.deleteSubtree(b)).toThrow("tried to delete a node that was already destroyed");
});

test("tryDeleteSubtree: reports invalid_operation as a result", () => {
  const first = buildABC();
  const second = buildABC();

  const res = first.tree.tryDeleteSubtree(second.c);
  expect(res.ok).toBe(false);
  if (!res.ok) expect(res.error.code).toBe("invalid_operation");

  expect(first.tree.tryDeleteSubtree(first.c)).toEqual({ ok: true, value: undefined });
});

test("deleteSubtree: unlinked child is an invariant violation, even through tryDeleteSubtree", () => {
  const { tree, a, b } = buildABC();
  // Break the linkage through the internal slot hook.
  a[replaceChildren]([]);

  expect(() => tree.deleteSubtree(b)).toThrow(InvariantViolationError);
  expect(() => tree.tryDeleteSubtree(b)).toThrow("target node to delete was not listed as a child of its parent");
  expect(b.destroyed).toBe(false);
});

test("deleteSubtree: debug traces explore depth-first, then delete in reverse", () => {
  const { tree, a, b, lines } = buildABC();
  b.addChild("D");
  tree.showDebugMessages = true;

  tree.deleteSubtree(a);

  expect(lines).toEqual([
    "Exploring node: A",
    "Exploring node: C",
    "Exploring node: B",
    "Exploring node: D",
    "Deleting node: D",
    "Deleting node: B",
    "Deleting node: C",
    "Deleting node: A",
  ]);
});

test("deleteSubtree: tombstones on the explore stack are skipped", () => {
  const { tree, a, c, lines } = buildABC();
  tree.deleteSubtree(c);
  expect(lines).toEqual([]);

  tree.showDebugMessages = true;
  tree.deleteSubtree(a);

  expect(lines).toEqual([
    "Exploring node: A",
    "Exploring node: [null]",
    "Exploring node: B",
    "Deleting node: B",
    "Deleting node: A",
  ]);
});

test("deleteSubtree: a very deep chain is removed without recursion", () => {
  const tree = new GenericTree<number>();
  let cur: TreeNode<number> = tree.createRoot(0);
  const depth = 50_000;
  for (let i = 1; i < depth; i++) cur = cur.addChild(i);

  expect(tree.nodeCount()).toBe(depth);
  tree.deleteSubtree(tree.getRoot());

  expect(tree.isEmpty()).toBe(true);
  expect(cur.destroyed).toBe(true);
});

test("clear: deletes everything and allows a new root", () => {
  const { tree, a } = buildABC();
  tree.clear();

  expect(tree.isEmpty()).toBe(true);
  expect(a.destroyed).toBe(true);

  tree.clear();
  const next = tree.createRoot("Z");
  expect(tree.getRoot()).toBe(next);
});

test("public surface: structural hooks are not reachable from the package entry", () => {
  const { tree, b } = buildABC();

  expect("destroy" in b).toBe(false);
  expect("replaceChildren" in b).toBe(false);
  expect("tombstoneChild" in b).toBe(false);
  expect(Object.keys(publicApi)).not.toContain("destroyNode");
  expect(Object.keys(publicApi)).not.toContain("replaceChildren");
  expect(Object.keys(publicApi)).not.toContain("tombstoneChild");
  expect(Object.keys(publicApi)).not.toContain("nodeToken");

  tree.deleteSubtree(b);
  expect(b.destroyed).toBe(true);
});

test("child slots: entries are frozen so a slot cannot be repointed", () => {
  const { tree, a, b, c } = buildABC();
  const first = a.children[0];
  if (!first) throw new Error("expected a slot");

  expect(Object.isFrozen(first)).toBe(true);
  expect(Reflect.set(first, "node", c)).toBe(false);
  expect(a.liveChildren()).toEqual([b, c]);
  expect(tree.toString()).toBe("A\n|\n|_ B\n|\n|_ C\n");

  tree.deleteSubtree(b);
  expect(a.children[0]).toEqual({ kind: "tombstone" });
});
