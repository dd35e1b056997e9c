import { roleOf, type ClassifiedGraph } from "../classify/roles.js";
import {
  BranchCondition,
  NodeKind,
  type CycleTruncation,
  type GraphEdge,
  type TaintPath
} from "../types/domain/graph.js";
import { Role } from "../types/domain/verdict.js";
import { UnknownSinkError } from "../errors/classification.errors.js";

export const DEFAULT_MAX_REVISITS = 1;
export const DEFAULT_MAX_PATHS_PER_SINK = 10_000;
export const DEFAULT_MAX_STEPS_PER_SINK = 1_000_000;

const DEADLINE_CHECK_INTERVAL = 1024;

export type EnumerationOptions = {
  /** Extra occurrences of one node allowed on a single path. */
  maxRevisits?: number;
  maxPathsPerSink?: number;
  /** Edges the search may follow for one sink before it gives up. */
  maxStepsPerSink?: number;
  /** Called periodically during the search; throw to abort it. */
  checkDeadline?: () => void;
};

export type SinkPaths = {
  paths: TaintPath[];
  /** The path or step budget ran out before the search finished. */
  limitReached: boolean;
};

type SearchBudget = {
  steps: number;
  maxSteps: number;
  exhausted: boolean;
  checkDeadline?: () => void;
};

type WalkContext = {
  classified: ClassifiedGraph;
  sinkId: string;
  entryId: string;
  entryRegistered: boolean;
  maxRevisits: number;
  reaching: ReadonlySet<string>;
  budget: SearchBudget;
};

/** A DeadGuard never lets control through, whatever its edges declare. */
export function effectiveCondition(classified: ClassifiedGraph, edge: GraphEdge): BranchCondition {
  if (roleOf(classified, edge.from).role === Role.DeadGuard) return BranchCondition.Never;
  return edge.condition;
}

export function isLivePath(path: TaintPath): boolean {
  return path.entryRegistered && path.conditions.every((condition) => condition !== BranchCondition.Never);
}

function occurrences(nodes: readonly string[], nodeId: string): number {
  let count = 0;
  for (const id of nodes) {
    if (id === nodeId) count += 1;
  }
  return count;
}

function collectTruncations(ctx: WalkContext, nodes: readonly string[]): CycleTruncation[] {
  const graph = ctx.classified.graph;
  const seen = new Set<string>();
  const truncations: CycleTruncation[] = [];
  for (let i = 0; i < nodes.length - 1; i += 1) {
    const via = nodes[i];
    const prefix = nodes.slice(0, i + 1);
    for (const edge of graph.outgoing(via)) {
      if (!ctx.reaching.has(edge.to)) continue;
      if (occurrences(prefix, edge.to) <= ctx.maxRevisits) continue;
      const key = `${via}->${edge.to}`;
      if (seen.has(key)) continue;
      seen.add(key);
      truncations.push({ nodeId: edge.to, via });
    }
  }
  return truncations;
}

function buildPath(ctx: WalkContext, nodes: string[], conditions: BranchCondition[]): TaintPath {
  return {
    entryId: ctx.entryId,
    sinkId: ctx.sinkId,
    nodes,
    conditions,
    entryRegistered: ctx.entryRegistered,
    truncations: collectTruncations(ctx, nodes)
  };
}

function firstOf<T>(iterable: Iterable<T>): T | null {
  for (const item of iterable) {
    return item;
  }
  return null;
}

function spendStep(budget: SearchBudget): boolean {
  if (budget.exhausted) return false;
  budget.steps += 1;
  if (budget.steps > budget.maxSteps) {
    budget.exhausted = true;
    return false;
  }
  if (budget.steps % DEADLINE_CHECK_INTERVAL === 0) budget.checkDeadline?.();
  return true;
}

// Paths are copied on every step so an abandoned generator leaves nothing to unwind.
function* walk(
  ctx: WalkContext,
  nodes: string[],
  conditions: BranchCondition[],
  dead: boolean
): Generator<TaintPath> {
  const current = nodes[nodes.length - 1];
  if (current === ctx.sinkId) {
    yield buildPath(ctx, nodes, conditions);
    return;
  }

  for (const edge of ctx.classified.graph.outgoing(current)) {
    // Nodes that cannot reach the sink can never complete a path.
    if (!ctx.reaching.has(edge.to)) continue;
    if (occurrences(nodes, edge.to) > ctx.maxRevisits) continue;
    if (!spendStep(ctx.budget)) return;
    const condition = effectiveCondition(ctx.classified, edge);
    const nextNodes = [...nodes, edge.to];
    const nextConditions = [...conditions, condition];

    if (!dead && condition === BranchCondition.Never) {
      // A never-taken edge yields a single dead witness instead of its whole subtree.
      const witness = firstOf(walk(ctx, nextNodes, nextConditions, true));
      if (witness) yield witness;
      continue;
    }

    yield* walk(ctx, nextNodes, nextConditions, dead);
  }
}

function* generatePaths(
  classified: ClassifiedGraph,
  sinkId: string,
  options: ResolvedOptions,
  budget: SearchBudget
): Generator<TaintPath> {
  const graph = classified.graph;
  const reaching = graph.nodesReaching(sinkId);
  for (const entry of graph.entryPoints()) {
    if (!reaching.has(entry.id)) continue;
    const ctx: WalkContext = {
      classified,
      sinkId,
      entryId: entry.id,
      entryRegistered: graph.isRegistered(entry.id),
      maxRevisits: options.maxRevisits,
      reaching,
      budget
    };
    yield* walk(ctx, [entry.id], [], false);
    if (budget.exhausted) return;
  }
}

type ResolvedOptions = {
  maxRevisits: number;
  maxPaths: number;
  maxSteps: number;
};

function resolveOptions(options: EnumerationOptions): ResolvedOptions {
  return {
    maxRevisits: Math.max(0, Math.trunc(options.maxRevisits ?? DEFAULT_MAX_REVISITS)),
    maxPaths: Math.max(1, Math.trunc(options.maxPathsPerSink ?? DEFAULT_MAX_PATHS_PER_SINK)),
    maxSteps: Math.max(1, Math.trunc(options.maxStepsPerSink ?? DEFAULT_MAX_STEPS_PER_SINK))
  };
}

function createBudget(resolved: ResolvedOptions, options: EnumerationOptions): SearchBudget {
  return { steps: 0, maxSteps: resolved.maxSteps, exhausted: false, checkDeadline: options.checkDeadline };
}

function requireSink(classified: ClassifiedGraph, sinkId: string): void {
  const node = classified.graph.getNode(sinkId);
  if (!node || node.kind !== NodeKind.Sink) {
    throw new UnknownSinkError(sinkId);
  }
}

/**
 * Lazily enumerates entry→sink paths: entry points in declaration order, then
 * depth-first over edges in declaration order. Every iteration starts from scratch.
 */
export function enumeratePaths(
  classified: ClassifiedGraph,
  sinkId: string,
  options: EnumerationOptions = {}
): Iterable<TaintPath> {
  requireSink(classified, sinkId);
  const resolved = resolveOptions(options);
  return {
    *[Symbol.iterator]() {
      let emitted = 0;
      for (const path of generatePaths(classified, sinkId, resolved, createBudget(resolved, options))) {
        yield path;
        emitted += 1;
        if (emitted >= resolved.maxPaths) return;
      }
    }
  };
}

export function enumerateSinkPaths(
  classified: ClassifiedGraph,
  sinkId: string,
  options: EnumerationOptions = {}
): SinkPaths {
  requireSink(classified, sinkId);
  const resolved = resolveOptions(options);
  const budget = createBudget(resolved, options);
  const iterator = generatePaths(classified, sinkId, resolved, budget);
  const paths: TaintPath[] = [];
  let next = iterator.next();
  while (!next.done) {
    if (paths.length >= resolved.maxPaths) {
      iterator.return(undefined);
      return { paths, limitReached: true };
    }
    paths.push(next.value);
    next = iterator.next();
  }
  return { paths, limitReached: budget.exhausted };
}
