import type { CallGraph } from "../graph/callGraph.js";
import type { UnclassifiableRoleError } from "../errors/classification.errors.js";
import type {
  Report,
  ReportPath,
  ReportSink,
  ReportSinkError,
  ReportWarning,
  SinkOutcome
} from "../types/domain/report.js";
import type { PathResult, ReportVerdict, SinkVerdict } from "../types/domain/verdict.js";

export const REPORT_VERSION = 1;

function emptyVerdictCounts(): Record<ReportVerdict, number> {
  return { MUST_FIX: 0, GOOD_TO_FIX: 0, FALSE_POSITIVE: 0, DEAD_CODE: 0, ERROR: 0 };
}

function toReportPath(result: PathResult): ReportPath {
  return {
    entryId: result.entryId,
    nodes: [...result.nodes],
    conditions: [...result.conditions],
    verdict: result.classification.verdict,
    authGateSeen: result.classification.authGateSeen,
    deadReason: result.classification.deadReason,
    truncations: result.truncations.map((truncation) => ({ ...truncation }))
  };
}

function verdictSink(base: Pick<ReportSink, "sinkId" | "label" | "sinkType">, verdict: SinkVerdict): ReportSink {
  return {
    ...base,
    overallVerdict: verdict.overall,
    reasons: [...verdict.reasons],
    rationale: verdict.rationale,
    confidence: verdict.confidence,
    paths: verdict.paths.map(toReportPath)
  };
}

function errorSink(base: Pick<ReportSink, "sinkId" | "label" | "sinkType">, error: ReportSinkError): ReportSink {
  return {
    ...base,
    overallVerdict: "ERROR",
    reasons: [],
    rationale: error.message,
    confidence: null,
    paths: [],
    error: { ...error }
  };
}

export function roleWarnings(errors: readonly UnclassifiableRoleError[]): ReportWarning[] {
  return errors.map((error): ReportWarning => ({
    code: "UNCLASSIFIABLE_ROLE",
    nodeId: error.nodeId,
    message: error.message
  }));
}

/**
 * Renders the report for every sink of the graph, in declaration order. A sink with no
 * outcome is reported as failed rather than left out.
 */
export function render(
  graph: CallGraph,
  outcomes: readonly SinkOutcome[],
  warnings: readonly ReportWarning[] = []
): Report {
  const outcomeBySink = new Map<string, SinkOutcome>();
  for (const outcome of outcomes) {
    if (!outcomeBySink.has(outcome.sinkId)) outcomeBySink.set(outcome.sinkId, outcome);
  }

  const counts = emptyVerdictCounts();
  let totalPaths = 0;
  const sinks = graph.sinks().map((node): ReportSink => {
    const base = {
      sinkId: node.id,
      label: node.label ?? null,
      sinkType: node.metadata.sinkType ?? "Other"
    };
    const outcome = outcomeBySink.get(node.id);
    const sink = !outcome
      ? errorSink(base, { code: "SINK_FAILED", message: "Sink was not classified." })
      : "verdict" in outcome
        ? verdictSink(base, outcome.verdict)
        : errorSink(base, outcome.error);
    counts[sink.overallVerdict] += 1;
    totalPaths += sink.paths.length;
    return sink;
  });

  return {
    version: REPORT_VERSION,
    sinks,
    summary: {
      totalSinks: sinks.length,
      totalPaths,
      counts
    },
    warnings: warnings.map((warning) => ({ ...warning }))
  };
}
