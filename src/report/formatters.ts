import pc from "picocolors";
import type { Report, ReportPath, ReportSink } from "../types/domain/report.js";
import type { PathVerdict, ReportVerdict } from "../types/domain/verdict.js";

function verdictLabel(verdict: ReportVerdict): string {
  switch (verdict) {
    case "MUST_FIX":
      return pc.bold(pc.red("MUST_FIX"));
    case "GOOD_TO_FIX":
      return pc.yellow("GOOD_TO_FIX");
    case "FALSE_POSITIVE":
      return pc.green("FALSE_POSITIVE");
    case "ERROR":
      return pc.magenta("ERROR");
    case "DEAD_CODE":
    default:
      return pc.dim("DEAD_CODE");
  }
}

function pathVerdictLabel(verdict: PathVerdict): string {
  switch (verdict) {
    case "VULNERABLE":
      return pc.red(verdict);
    case "PARTIALLY_MITIGATED":
      return pc.yellow(verdict);
    case "DEAD":
      return pc.dim(verdict);
    default:
      return pc.green(verdict);
  }
}

const VERDICT_RANK: Record<ReportVerdict, number> = {
  MUST_FIX: 4,
  GOOD_TO_FIX: 3,
  ERROR: 2,
  FALSE_POSITIVE: 1,
  DEAD_CODE: 0
};

function formatPath(path: ReportPath, index: number): string {
  const lines = [`  path #${index} ${pathVerdictLabel(path.verdict)}: ${path.nodes.join(" -> ")}`];
  const notes: string[] = [];
  if (path.deadReason) notes.push(`dead: ${path.deadReason}`);
  if (path.authGateSeen && path.verdict !== "AUTH_PROTECTED") notes.push("auth gate on path");
  if (path.truncations.length > 0) {
    notes.push(`cycle truncated at ${path.truncations.map((t) => `${t.via}->${t.nodeId}`).join(", ")}`);
  }
  if (notes.length > 0) lines.push(`    (${notes.join("; ")})`);
  return lines.join("\n");
}

function formatSink(sink: ReportSink): string {
  const label = sink.label ? ` ${pc.dim(sink.label)}` : "";
  const lines = [`${verdictLabel(sink.overallVerdict)} ${sink.sinkId} [${sink.sinkType}]${label}`];
  if (sink.error) {
    lines.push(`  error: ${sink.error.code}: ${sink.error.message}`);
    return lines.join("\n");
  }
  const confidence = sink.confidence ? ` (confidence ${sink.confidence})` : "";
  lines.push(`  rationale: ${sink.rationale}${confidence}`);
  sink.paths.forEach((path, index) => lines.push(formatPath(path, index + 1)));
  return lines.join("\n");
}

function buildSummary(report: Report): string {
  const counts = report.summary.counts;
  return [
    "TAINTPATH SUMMARY",
    "-----------------",
    `- Sinks: ${report.summary.totalSinks} total (MUST_FIX ${counts.MUST_FIX}, GOOD_TO_FIX ${counts.GOOD_TO_FIX}, FALSE_POSITIVE ${counts.FALSE_POSITIVE}, DEAD_CODE ${counts.DEAD_CODE}, ERROR ${counts.ERROR})`,
    `- Paths: ${report.summary.totalPaths}`,
    `- Warnings: ${report.warnings.length}`
  ].join("\n");
}

export function formatReportText(report: Report): string {
  if (report.sinks.length === 0) {
    return `${buildSummary(report)}\n\nNo sinks.`;
  }

  // Worst first; declaration order breaks ties.
  const ordered = report.sinks
    .map((sink, index) => ({ sink, index }))
    .sort((a, b) => VERDICT_RANK[b.sink.overallVerdict] - VERDICT_RANK[a.sink.overallVerdict] || a.index - b.index)
    .map(({ sink }) => sink);

  const sections = [buildSummary(report), "", "SINKS", ordered.map(formatSink).join("\n\n")];
  if (report.warnings.length > 0) {
    sections.push("", "WARNINGS", ...report.warnings.map((w) => pc.yellow(`- ${w.code} ${w.nodeId}: ${w.message}`)));
  }
  return sections.join("\n");
}

export function formatReportJson(report: Report): string {
  return JSON.stringify(report, null, 2);
}
