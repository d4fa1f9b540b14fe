// Structural hooks shared by node.ts and tree.ts. Not re-exported from index.ts, so package
// consumers cannot reach them.
export const nodeToken: unique symbol = Symbol("ntree.node");
export const tombstoneChild: unique symbol = Symbol("ntree.tombstoneChild");
export const replaceChildren: unique symbol = Symbol("ntree.replaceChildren");
export const destroyNode: unique symbol = Symbol("ntree.destroyNode");
