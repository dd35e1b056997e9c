import type { ClassificationPolicy } from "../types/domain/verdict.js";

/**
 * Where the line between "still exploitable" and "benign" sits. Weakly validated
 * paths stay fixable and gated paths count as false positives unless configured otherwise.
 */
export const DEFAULT_CLASSIFICATION_POLICY: Readonly<ClassificationPolicy> = Object.freeze({
  partiallyMitigatedVerdict: "GOOD_TO_FIX",
  authProtectedVerdict: "FALSE_POSITIVE",
  rateLimiterAsAuthzGate: false
});

export function resolvePolicy(policy?: Partial<ClassificationPolicy>): ClassificationPolicy {
  return { ...DEFAULT_CLASSIFICATION_POLICY, ...(policy ?? {}) };
}
