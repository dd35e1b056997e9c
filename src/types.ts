export type {
  CycleTruncation,
  GraphEdge,
  GraphNode,
  NodeMetadata,
  RoleTag,
  RoleTagObject,
  SinkType,
  TaintPath,
  ValidatorStrength
} from "./types/domain/graph.js";
export { BranchCondition, NodeKind } from "./types/domain/graph.js";
export type {
  ClassificationPolicy,
  Confidence,
  DeadReason,
  LivePathVerdict,
  OverallVerdict,
  PathClassification,
  PathProtections,
  PathResult,
  PathVerdict,
  ReportVerdict,
  SinkVerdict
} from "./types/domain/verdict.js";
export { Role } from "./types/domain/verdict.js";
export type {
  Report,
  ReportPath,
  ReportSink,
  ReportSinkError,
  ReportSummary,
  ReportWarning,
  SinkOutcome
} from "./types/domain/report.js";
