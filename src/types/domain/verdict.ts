import type { BranchCondition, CycleTruncation } from "./graph.js";

export const Role = {
  None: "None",
  Source: "Source",
  Sanitizer: "Sanitizer",
  Validator: "Validator",
  AuthzGate: "AuthzGate",
  RateLimiter: "RateLimiter",
  DeadGuard: "DeadGuard"
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export type PathVerdict =
  | "VULNERABLE"
  | "PARTIALLY_MITIGATED"
  | "SANITIZED"
  | "AUTH_PROTECTED"
  | "DEAD";

export type LivePathVerdict = Exclude<PathVerdict, "DEAD">;

export type OverallVerdict = "MUST_FIX" | "GOOD_TO_FIX" | "FALSE_POSITIVE" | "DEAD_CODE";

export type ReportVerdict = OverallVerdict | "ERROR";

export type Confidence = "high" | "medium" | "low";

export type DeadReason = "unregistered-entry" | "never-branch";

export type PathProtections = {
  sanitizers: string[];
  strictValidators: string[];
  weakValidators: string[];
  authzGates: string[];
  rateLimiters: string[];
  /** Sanitizers or strict validators whose declared coverage excludes the sink. */
  mismatched: string[];
};

export type PathClassification = {
  verdict: PathVerdict;
  authGateSeen: boolean;
  deadReason: DeadReason | null;
  protections: PathProtections;
  /** Nodes on the path whose role tags could not be classified. */
  unclassifiedNodes: string[];
};

export type PathResult = {
  entryId: string;
  nodes: string[];
  conditions: BranchCondition[];
  truncations: CycleTruncation[];
  classification: PathClassification;
};

export type SinkVerdict = {
  sinkId: string;
  overall: OverallVerdict;
  reasons: LivePathVerdict[];
  counts: Record<PathVerdict, number>;
  rationale: string;
  confidence: Confidence;
  paths: PathResult[];
  pathLimitReached: boolean;
};

export type ClassificationPolicy = {
  partiallyMitigatedVerdict: Extract<OverallVerdict, "GOOD_TO_FIX" | "MUST_FIX">;
  authProtectedVerdict: Extract<OverallVerdict, "FALSE_POSITIVE" | "GOOD_TO_FIX">;
  rateLimiterAsAuthzGate: boolean;
};
