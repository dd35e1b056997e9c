import type {
  ClassificationPolicy,
  Confidence,
  LivePathVerdict,
  OverallVerdict,
  PathResult,
  PathVerdict,
  SinkVerdict
} from "../types/domain/verdict.js";
import { resolvePolicy } from "./policy.js";

const PATH_VERDICT_ORDER: PathVerdict[] = [
  "DEAD",
  "VULNERABLE",
  "PARTIALLY_MITIGATED",
  "SANITIZED",
  "AUTH_PROTECTED"
];

const PATH_VERDICT_LABELS: Record<PathVerdict, string> = {
  DEAD: "dead",
  VULNERABLE: "vulnerable",
  PARTIALLY_MITIGATED: "partially mitigated",
  SANITIZED: "sanitized",
  AUTH_PROTECTED: "auth protected"
};

const OVERALL_SEVERITY: Record<OverallVerdict, number> = {
  DEAD_CODE: 0,
  FALSE_POSITIVE: 1,
  GOOD_TO_FIX: 2,
  MUST_FIX: 3
};

export type AggregateOptions = {
  policy?: Partial<ClassificationPolicy>;
  pathLimitReached?: boolean;
  /** Entry point ids in graph declaration order; paths are listed in this order. */
  entryOrder?: readonly string[];
};

function emptyCounts(): Record<PathVerdict, number> {
  return { DEAD: 0, VULNERABLE: 0, PARTIALLY_MITIGATED: 0, SANITIZED: 0, AUTH_PROTECTED: 0 };
}

function liveOutcome(verdict: LivePathVerdict, policy: ClassificationPolicy): OverallVerdict {
  switch (verdict) {
    case "VULNERABLE":
      return "MUST_FIX";
    case "PARTIALLY_MITIGATED":
      return policy.partiallyMitigatedVerdict;
    case "AUTH_PROTECTED":
      return policy.authProtectedVerdict;
    case "SANITIZED":
    default:
      return "FALSE_POSITIVE";
  }
}

function compareLists(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
}

function comparePaths(entryRank: ReadonlyMap<string, number>) {
  const rankOf = (entryId: string) => entryRank.get(entryId) ?? Number.MAX_SAFE_INTEGER;
  return (a: PathResult, b: PathResult): number => {
    if (a.entryId !== b.entryId) {
      return rankOf(a.entryId) - rankOf(b.entryId) || (a.entryId < b.entryId ? -1 : 1);
    }
    return compareLists(a.nodes, b.nodes) || compareLists(a.conditions, b.conditions);
  };
}

export function formatRationale(counts: Record<PathVerdict, number>): string {
  const parts = PATH_VERDICT_ORDER.filter((verdict) => counts[verdict] > 0).map(
    (verdict) => `${counts[verdict]} ${PATH_VERDICT_LABELS[verdict]}`
  );
  return parts.length > 0 ? parts.join(", ") : "no paths";
}

function resolveConfidence(paths: readonly PathResult[], pathLimitReached: boolean): Confidence {
  const liveUnclassified = paths.some(
    (path) => path.classification.verdict !== "DEAD" && path.classification.unclassifiedNodes.length > 0
  );
  if (liveUnclassified) return "low";
  if (pathLimitReached || paths.some((path) => path.truncations.length > 0)) return "medium";
  return "high";
}

/**
 * Worst live path decides. Only live VULNERABLE and PARTIALLY_MITIGATED paths raise
 * severity; a sink without any live path is dead code.
 */
export function aggregate(
  sinkId: string,
  results: readonly PathResult[],
  options: AggregateOptions = {}
): SinkVerdict {
  const policy = resolvePolicy(options.policy);
  const counts = emptyCounts();
  let overall: OverallVerdict = "DEAD_CODE";
  const live = new Set<LivePathVerdict>();

  for (const result of results) {
    const verdict = result.classification.verdict;
    counts[verdict] += 1;
    if (verdict === "DEAD") continue;
    live.add(verdict);
    const outcome = liveOutcome(verdict, policy);
    if (OVERALL_SEVERITY[outcome] > OVERALL_SEVERITY[overall]) {
      overall = outcome;
    }
  }

  const reasons: LivePathVerdict[] = [];
  for (const verdict of PATH_VERDICT_ORDER) {
    if (verdict !== "DEAD" && live.has(verdict)) reasons.push(verdict);
  }

  const pathLimitReached = options.pathLimitReached ?? false;
  const entryRank = new Map((options.entryOrder ?? []).map((id, index): [string, number] => [id, index]));
  return {
    sinkId,
    overall,
    reasons,
    counts,
    rationale: formatRationale(counts),
    confidence: resolveConfidence(results, pathLimitReached),
    paths: [...results].sort(comparePaths(entryRank)),
    pathLimitReached
  };
}
