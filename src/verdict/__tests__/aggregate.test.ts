import assert from "node:assert/strict";
import { test } from "node:test";
import { aggregate, formatRationale } from "../aggregate.js";
import type { BranchCondition, CycleTruncation } from "../../types/domain/graph.js";
import type { PathResult, PathVerdict } from "../../types/domain/verdict.js";

const makeResult = (
  entryId: string,
  verdict: PathVerdict,
  extras: { nodes?: string[]; unclassifiedNodes?: string[]; truncations?: CycleTruncation[] } = {}
): PathResult => {
  const nodes = extras.nodes ?? [entryId, "sink"];
  return {
    entryId,
    nodes,
    conditions: nodes.slice(1).map((): BranchCondition => (verdict === "DEAD" ? "Never" : "Always")),
    truncations: extras.truncations ?? [],
    classification: {
      verdict,
      authGateSeen: verdict === "AUTH_PROTECTED",
      deadReason: verdict === "DEAD" ? "never-branch" : null,
      protections: {
        sanitizers: [],
        strictValidators: [],
        weakValidators: [],
        authzGates: [],
        rateLimiters: [],
        mismatched: []
      },
      unclassifiedNodes: extras.unclassifiedNodes ?? []
    }
  };
};

test("one unprotected live path must be fixed", () => {
  const verdict = aggregate("sink", [makeResult("e", "VULNERABLE")]);
  assert.equal(verdict.overall, "MUST_FIX");
  assert.deepEqual(verdict.reasons, ["VULNERABLE"]);
  assert.equal(verdict.rationale, "1 vulnerable");
  assert.equal(verdict.confidence, "high");
});

test("one strictly validated path is a false positive", () => {
  const verdict = aggregate("sink", [makeResult("e", "SANITIZED")]);
  assert.equal(verdict.overall, "FALSE_POSITIVE");
  assert.deepEqual(verdict.reasons, ["SANITIZED"]);
});

test("one weakly validated path is good to fix", () => {
  assert.equal(aggregate("sink", [makeResult("e", "PARTIALLY_MITIGATED")]).overall, "GOOD_TO_FIX");
});

test("dead paths are evidence but never decide a sink with a live path", () => {
  const verdict = aggregate("sink", [
    makeResult("e1", "DEAD"),
    makeResult("e2", "SANITIZED"),
    makeResult("e3", "DEAD")
  ]);
  assert.equal(verdict.overall, "FALSE_POSITIVE");
  assert.deepEqual(verdict.reasons, ["SANITIZED"]);
  assert.equal(verdict.rationale, "2 dead, 1 sanitized");
  assert.deepEqual(verdict.counts, {
    DEAD: 2,
    VULNERABLE: 0,
    PARTIALLY_MITIGATED: 0,
    SANITIZED: 1,
    AUTH_PROTECTED: 0
  });
  assert.equal(verdict.paths.length, 3);
});

test("a sink whose paths are all dead is dead code", () => {
  const verdict = aggregate("sink", [makeResult("e1", "DEAD"), makeResult("e2", "DEAD")]);
  assert.equal(verdict.overall, "DEAD_CODE");
  assert.deepEqual(verdict.reasons, []);
  assert.equal(verdict.rationale, "2 dead");
});

test("a sink without paths is dead code", () => {
  const verdict = aggregate("sink", []);
  assert.equal(verdict.overall, "DEAD_CODE");
  assert.equal(verdict.rationale, "no paths");
  assert.equal(verdict.confidence, "high");
  assert.equal(verdict.pathLimitReached, false);
});

test("the worst live path wins", () => {
  const verdict = aggregate("sink", [
    makeResult("a", "SANITIZED"),
    makeResult("b", "PARTIALLY_MITIGATED"),
    makeResult("c", "VULNERABLE"),
    makeResult("d", "AUTH_PROTECTED")
  ]);
  assert.equal(verdict.overall, "MUST_FIX");
  assert.deepEqual(verdict.reasons, ["VULNERABLE", "PARTIALLY_MITIGATED", "SANITIZED", "AUTH_PROTECTED"]);
  assert.equal(verdict.rationale, "1 vulnerable, 1 partially mitigated, 1 sanitized, 1 auth protected");
});

test("sanitized and gated paths together stay benign", () => {
  const verdict = aggregate("sink", [makeResult("b", "AUTH_PROTECTED"), makeResult("a", "SANITIZED")]);
  assert.equal(verdict.overall, "FALSE_POSITIVE");
  assert.deepEqual(verdict.reasons, ["SANITIZED", "AUTH_PROTECTED"]);
});

test("the result does not depend on input order and is stable on repeat", () => {
  const results = [
    makeResult("e2", "VULNERABLE", { nodes: ["e2", "x", "sink"] }),
    makeResult("e1", "DEAD"),
    makeResult("e2", "SANITIZED", { nodes: ["e2", "a", "sink"] }),
    makeResult("e1", "PARTIALLY_MITIGATED", { nodes: ["e1", "b", "sink"] })
  ];
  const forward = aggregate("sink", results);
  const backward = aggregate("sink", [...results].reverse());
  assert.deepEqual(backward, forward);
  assert.deepEqual(aggregate("sink", results), forward);
  assert.deepEqual(
    forward.paths.map((path) => path.nodes.join(">")),
    ["e1>b>sink", "e1>sink", "e2>a>sink", "e2>x>sink"]
  );
});

test("policy moves the line for weak validation and gates", () => {
  assert.equal(
    aggregate("sink", [makeResult("e", "PARTIALLY_MITIGATED")], {
      policy: { partiallyMitigatedVerdict: "MUST_FIX" }
    }).overall,
    "MUST_FIX"
  );
  assert.equal(
    aggregate("sink", [makeResult("e", "AUTH_PROTECTED"), makeResult("f", "SANITIZED")], {
      policy: { authProtectedVerdict: "GOOD_TO_FIX" }
    }).overall,
    "GOOD_TO_FIX"
  );
});

test("confidence drops for unclassified roles on live paths, truncation and limits", () => {
  assert.equal(
    aggregate("sink", [makeResult("e", "VULNERABLE", { unclassifiedNodes: ["odd"] })]).confidence,
    "low"
  );
  assert.equal(aggregate("sink", [makeResult("e", "DEAD", { unclassifiedNodes: ["odd"] })]).confidence, "high");
  assert.equal(
    aggregate("sink", [makeResult("e", "SANITIZED", { truncations: [{ nodeId: "a", via: "b" }] })]).confidence,
    "medium"
  );
  const limited = aggregate("sink", [makeResult("e", "SANITIZED")], { pathLimitReached: true });
  assert.equal(limited.confidence, "medium");
  assert.equal(limited.pathLimitReached, true);
});

test("formatRationale lists non-zero counts in a fixed order", () => {
  assert.equal(
    formatRationale({ DEAD: 0, VULNERABLE: 2, PARTIALLY_MITIGATED: 0, SANITIZED: 0, AUTH_PROTECTED: 3 }),
    "2 vulnerable, 3 auth protected"
  );
});

test("paths follow the declared entry order when one is given", () => {
  const results = [
    makeResult("ep.a", "SANITIZED"),
    makeResult("ep.z", "VULNERABLE", { nodes: ["ep.z", "y", "sink"] }),
    makeResult("ep.z", "DEAD", { nodes: ["ep.z", "x", "sink"] })
  ];
  const entryOrder = ["ep.z", "ep.a"];
  const forward = aggregate("sink", results, { entryOrder });
  assert.deepEqual(
    forward.paths.map((path) => path.nodes.join(">")),
    ["ep.z>x>sink", "ep.z>y>sink", "ep.a>sink"]
  );
  assert.deepEqual(aggregate("sink", [...results].reverse(), { entryOrder }), forward);
});
