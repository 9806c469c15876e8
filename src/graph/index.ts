export * from "./errors.js";
export * from "./model.js";
export * from "./descriptor.js";
export * from "./stats.js";
export * from "./scc.js";
export * from "./topologicalSort.js";
export * from "./dagPaths.js";
