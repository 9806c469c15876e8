export * from "./graph/index.js";
export * from "./metrics.js";
export * from "./types.js";
export * from "./logger.js";
export * from "./plannerOptions.js";
export * from "./planner/pipeline.js";
export * from "./planner/performance.js";
export * from "./planner/report.js";
export * from "./export/resultExporter.js";
