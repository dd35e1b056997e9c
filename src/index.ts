export * from "./graph/callGraph.js";
export * from "./graph/ingest.js";
export * from "./classify/roles.js";
export * from "./paths/enumerate.js";
export * from "./verdict/pathVerdict.js";
export * from "./verdict/aggregate.js";
export * from "./verdict/policy.js";
export * from "./report/report.js";
export * from "./report/formatters.js";
export * from "./run/runClassification.js";
export * from "./config/loadConfig.js";
export * from "./logging/logger.js";
export * from "./errors/graph.errors.js";
export * from "./errors/classification.errors.js";
export * from "./errors/config.errors.js";
export * from "./types.js";
