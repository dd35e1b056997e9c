import type { BranchCondition, CycleTruncation, SinkType } from "./graph.js";
import type {
  Confidence,
  DeadReason,
  LivePathVerdict,
  PathVerdict,
  ReportVerdict,
  SinkVerdict
} from "./verdict.js";

export type ReportWarning = {
  code: "UNCLASSIFIABLE_ROLE" | "ORPHANED_SINK";
  nodeId: string;
  message: string;
};

export type ReportPath = {
  entryId: string;
  nodes: string[];
  conditions: BranchCondition[];
  verdict: PathVerdict;
  authGateSeen: boolean;
  deadReason: DeadReason | null;
  truncations: CycleTruncation[];
};

export type ReportSinkError = {
  code: "ORPHANED_SINK" | "SINK_FAILED";
  message: string;
};

export type ReportSink = {
  sinkId: string;
  label: string | null;
  sinkType: SinkType;
  overallVerdict: ReportVerdict;
  reasons: LivePathVerdict[];
  rationale: string;
  confidence: Confidence | null;
  paths: ReportPath[];
  error?: ReportSinkError;
};

export type ReportSummary = {
  totalSinks: number;
  totalPaths: number;
  counts: Record<ReportVerdict, number>;
};

export interface Report {
  version: 1;
  sinks: ReportSink[];
  summary: ReportSummary;
  warnings: ReportWarning[];
}

export type SinkOutcome =
  | { sinkId: string; verdict: SinkVerdict }
  | { sinkId: string; error: ReportSinkError };
