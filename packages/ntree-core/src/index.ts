export * from "./errors.js";
export * from "./node.js";
export * from "./render.js";
export * from "./tree.js";
