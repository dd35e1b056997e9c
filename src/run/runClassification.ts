import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { CallGraph } from "../graph/callGraph.js";
import { classifyGraph, type ClassifiedGraph } from "../classify/roles.js";
import { enumerateSinkPaths, type EnumerationOptions } from "../paths/enumerate.js";
import { classifyPath } from "../verdict/pathVerdict.js";
import { aggregate } from "../verdict/aggregate.js";
import { resolvePolicy } from "../verdict/policy.js";
import { render, roleWarnings } from "../report/report.js";
import { runWithConcurrency } from "./concurrency.js";
import { noopLogger, withContext, type Logger } from "../logging/logger.js";
import { defaultConcurrency } from "../config/defaults.js";
import { OrphanedSinkError } from "../errors/graph.errors.js";
import { ClassificationTimeoutError } from "../errors/classification.errors.js";
import type { ClassifyProgressHandler } from "./progress.js";
import type { Report, ReportWarning, SinkOutcome } from "../types/domain/report.js";
import type { ClassificationPolicy, PathResult, SinkVerdict } from "../types/domain/verdict.js";

export type RunClassificationOptions = {
  policy?: Partial<ClassificationPolicy>;
  enumeration?: EnumerationOptions;
  concurrency?: number;
  /** Budget for the whole run; 0 disables it. */
  timeoutMs?: number;
  strictOrphans?: boolean;
  logger?: Logger;
  onProgress?: ClassifyProgressHandler;
  now?: () => number;
};

export type ClassificationRun = {
  report: Report;
  durationMs: number;
};

export type ClassifySinkOptions = {
  policy?: Partial<ClassificationPolicy>;
  enumeration?: EnumerationOptions;
};

/** Enumerates, classifies and aggregates the paths of one sink. */
export function classifySink(
  classified: ClassifiedGraph,
  sinkId: string,
  options: ClassifySinkOptions = {}
): SinkVerdict {
  const policy = resolvePolicy(options.policy);
  const { paths, limitReached } = enumerateSinkPaths(classified, sinkId, options.enumeration);
  const results = paths.map(
    (path): PathResult => ({
      entryId: path.entryId,
      nodes: path.nodes,
      conditions: path.conditions,
      truncations: path.truncations,
      classification: classifyPath(classified, path, policy)
    })
  );
  return aggregate(sinkId, results, {
    policy,
    pathLimitReached: limitReached,
    entryOrder: classified.graph.entryPoints().map((node) => node.id)
  });
}

function orphanWarnings(orphaned: readonly string[]): ReportWarning[] {
  return orphaned.map((nodeId): ReportWarning => ({
    code: "ORPHANED_SINK",
    nodeId,
    message: new OrphanedSinkError(nodeId).message
  }));
}

/**
 * Classifies every sink of `graph`. Sinks are independent units run through a bounded
 * pool; a failing sink is reported as an error entry and the rest carry on.
 */
export async function runClassification(
  graph: CallGraph,
  options: RunClassificationOptions = {}
): Promise<ClassificationRun> {
  const now = options.now ?? Date.now;
  const start = now();
  const log = options.logger ?? noopLogger;
  const policy = resolvePolicy(options.policy);
  const timeoutMs = Math.max(0, Math.trunc(options.timeoutMs ?? 0));
  const deadline = timeoutMs > 0 ? start + timeoutMs : null;

  const orphaned = graph.orphanedSinks();
  if (options.strictOrphans && orphaned.length > 0) {
    throw new OrphanedSinkError(orphaned[0]);
  }
  const orphanedSet = new Set(orphaned);

  const classified = classifyGraph(graph);
  options.onProgress?.({ phase: "roles", current: graph.nodes.length, total: graph.nodes.length });
  for (const warning of classified.warnings) {
    log.warn(warning.message, { nodeId: warning.nodeId, tag: warning.tag });
  }

  const sinks = graph.sinks();
  const concurrency = Math.min(options.concurrency ?? defaultConcurrency(), Math.max(1, sinks.length));
  log.info("Classifying sinks", { sinks: sinks.length, concurrency, timeoutMs });

  let completed = 0;
  const checkDeadline = () => {
    if (deadline !== null && now() > deadline) {
      throw new ClassificationTimeoutError(timeoutMs, completed);
    }
  };
  const enumeration: EnumerationOptions = { ...options.enumeration, checkDeadline };

  const outcomes = await runWithConcurrency(sinks, concurrency, async (sink): Promise<SinkOutcome> => {
    await yieldToEventLoop();
    checkDeadline();
    const sinkLog = withContext(log, { sinkId: sink.id });
    try {
      if (orphanedSet.has(sink.id)) {
        const message = new OrphanedSinkError(sink.id).message;
        sinkLog.warn(message);
        return { sinkId: sink.id, error: { code: "ORPHANED_SINK", message } };
      }
      const verdict = classifySink(classified, sink.id, { policy, enumeration });
      if (verdict.pathLimitReached) {
        sinkLog.warn("Path search stopped at its budget; verdict based on the paths found so far", {
          paths: verdict.paths.length
        });
      }
      sinkLog.debug("Sink classified", {
        overall: verdict.overall,
        paths: verdict.paths.length,
        rationale: verdict.rationale
      });
      return { sinkId: sink.id, verdict };
    } catch (err) {
      if (err instanceof ClassificationTimeoutError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      sinkLog.error("Sink classification failed", { error: message });
      return { sinkId: sink.id, error: { code: "SINK_FAILED", message } };
    } finally {
      completed += 1;
      options.onProgress?.({ phase: "sinks", current: completed, total: sinks.length, sinkId: sink.id });
    }
  });

  const report = render(graph, outcomes, [...roleWarnings(classified.warnings), ...orphanWarnings(orphaned)]);
  const durationMs = now() - start;
  log.info("Classification complete", { durationMs, counts: report.summary.counts });
  return { report, durationMs };
}
