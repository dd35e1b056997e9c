import { roleOf, type ClassifiedGraph, type RoleTrait } from "../classify/roles.js";
import { isLivePath } from "../paths/enumerate.js";
import type { SinkType, TaintPath } from "../types/domain/graph.js";
import {
  Role,
  type ClassificationPolicy,
  type DeadReason,
  type PathClassification,
  type PathProtections,
  type PathVerdict
} from "../types/domain/verdict.js";
import { resolvePolicy } from "./policy.js";

const SINK_VULNERABILITY_CLASS: Record<SinkType, string | null> = {
  SQL: "sql-injection",
  Template: "template-injection",
  Command: "command-injection",
  Other: null
};

const WILDCARD_PROTECTS = new Set(["*", "all"]);

export function sinkTypeOf(classified: ClassifiedGraph, sinkId: string): SinkType {
  return classified.graph.getNode(sinkId)?.metadata.sinkType ?? "Other";
}

function covers(trait: RoleTrait, vulnerabilityClass: string | null): boolean {
  if (trait.protects.length === 0 || vulnerabilityClass === null) return true;
  return trait.protects.some((item) => item === vulnerabilityClass || WILDCARD_PROTECTS.has(item));
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

function emptyProtections(): PathProtections {
  return {
    sanitizers: [],
    strictValidators: [],
    weakValidators: [],
    authzGates: [],
    rateLimiters: [],
    mismatched: []
  };
}

function collectProtections(
  classified: ClassifiedGraph,
  path: TaintPath
): { protections: PathProtections; unclassifiedNodes: string[] } {
  const protections = emptyProtections();
  const unclassifiedNodes: string[] = [];
  const vulnerabilityClass = SINK_VULNERABILITY_CLASS[sinkTypeOf(classified, path.sinkId)];

  // The sink itself is the operation being judged, never its own protection.
  for (const nodeId of path.nodes.slice(0, -1)) {
    const assignment = roleOf(classified, nodeId);
    if (assignment.warnings.length > 0) pushUnique(unclassifiedNodes, nodeId);
    for (const trait of assignment.traits) {
      switch (trait.role) {
        case Role.Sanitizer:
          pushUnique(covers(trait, vulnerabilityClass) ? protections.sanitizers : protections.mismatched, nodeId);
          break;
        case Role.Validator:
          if (trait.strength === "Strict") {
            pushUnique(
              covers(trait, vulnerabilityClass) ? protections.strictValidators : protections.mismatched,
              nodeId
            );
          } else if (trait.strength === "Weak") {
            pushUnique(protections.weakValidators, nodeId);
          }
          break;
        case Role.AuthzGate:
          pushUnique(protections.authzGates, nodeId);
          break;
        case Role.RateLimiter:
          pushUnique(protections.rateLimiters, nodeId);
          break;
        default:
          break;
      }
    }
  }

  return { protections, unclassifiedNodes };
}

function deadReasonOf(path: TaintPath): DeadReason {
  return path.entryRegistered ? "never-branch" : "unregistered-entry";
}

/**
 * Folds one path into a verdict. Precedence is fixed: dead, then sanitized, then
 * gated, then weakly validated, otherwise vulnerable.
 */
export function classifyPath(
  classified: ClassifiedGraph,
  path: TaintPath,
  policy?: Partial<ClassificationPolicy>
): PathClassification {
  const resolved = resolvePolicy(policy);
  const { protections, unclassifiedNodes } = collectProtections(classified, path);
  const authGateSeen =
    protections.authzGates.length > 0 ||
    (resolved.rateLimiterAsAuthzGate && protections.rateLimiters.length > 0);

  let verdict: PathVerdict;
  let deadReason: DeadReason | null = null;
  if (!isLivePath(path)) {
    verdict = "DEAD";
    deadReason = deadReasonOf(path);
  } else if (protections.sanitizers.length > 0 || protections.strictValidators.length > 0) {
    verdict = "SANITIZED";
  } else if (authGateSeen) {
    verdict = "AUTH_PROTECTED";
  } else if (protections.weakValidators.length > 0) {
    verdict = "PARTIALLY_MITIGATED";
  } else {
    verdict = "VULNERABLE";
  }

  return { verdict, authGateSeen, deadReason, protections, unclassifiedNodes };
}
