import assert from "node:assert/strict";
import { test } from "node:test";
import { render, roleWarnings, REPORT_VERSION } from "../report.js";
import { classifySink } from "../../run/runClassification.js";
import { classifyGraph } from "../../classify/roles.js";
import { createGraphBuilder } from "../../graph/callGraph.js";
import { NodeKind } from "../../types/domain/graph.js";
import { UnclassifiableRoleError } from "../../errors/classification.errors.js";

const buildGraph = () =>
  createGraphBuilder()
    .addNode({ id: "e", kind: NodeKind.EntryPoint })
    .addNode({ id: "s1", kind: NodeKind.Sink, label: "users query", metadata: { sinkType: "SQL" } })
    .addNode({ id: "s2", kind: NodeKind.Sink })
    .addNode({ id: "s3", kind: NodeKind.Sink, metadata: { sinkType: "Template" } })
    .addEdge("e", "s1")
    .addEdge("e", "s3")
    .markEntryRegistered("e")
    .build();

test("render lists every sink once, in declaration order", () => {
  const graph = buildGraph();
  const classified = classifyGraph(graph);
  const verdict = classifySink(classified, "s1");

  const report = render(graph, [
    { sinkId: "s2", error: { code: "ORPHANED_SINK", message: "no incoming edge" } },
    { sinkId: "s1", verdict },
    { sinkId: "s1", error: { code: "SINK_FAILED", message: "ignored" } }
  ]);

  assert.equal(report.version, REPORT_VERSION);
  assert.deepEqual(
    report.sinks.map((sink) => [sink.sinkId, sink.overallVerdict]),
    [
      ["s1", "MUST_FIX"],
      ["s2", "ERROR"],
      ["s3", "ERROR"]
    ]
  );
  assert.deepEqual(report.sinks[0], {
    sinkId: "s1",
    label: "users query",
    sinkType: "SQL",
    overallVerdict: "MUST_FIX",
    reasons: ["VULNERABLE"],
    rationale: "1 vulnerable",
    confidence: "high",
    paths: [
      {
        entryId: "e",
        nodes: ["e", "s1"],
        conditions: ["Always"],
        verdict: "VULNERABLE",
        authGateSeen: false,
        deadReason: null,
        truncations: []
      }
    ]
  });
  assert.deepEqual(report.sinks[1], {
    sinkId: "s2",
    label: null,
    sinkType: "Other",
    overallVerdict: "ERROR",
    reasons: [],
    rationale: "no incoming edge",
    confidence: null,
    paths: [],
    error: { code: "ORPHANED_SINK", message: "no incoming edge" }
  });
  assert.deepEqual(report.sinks[2]?.error, { code: "SINK_FAILED", message: "Sink was not classified." });
  assert.deepEqual(report.summary, {
    totalSinks: 3,
    totalPaths: 1,
    counts: { MUST_FIX: 1, GOOD_TO_FIX: 0, FALSE_POSITIVE: 0, DEAD_CODE: 0, ERROR: 2 }
  });
  assert.deepEqual(report.warnings, []);
});

test("roleWarnings turns classifier errors into report warnings", () => {
  const warnings = roleWarnings([new UnclassifiableRoleError("n1", "escaper")]);
  assert.deepEqual(warnings, [
    {
      code: "UNCLASSIFIABLE_ROLE",
      nodeId: "n1",
      message: 'Node "n1" declares unknown role tag "escaper"; treated as a plain call.'
    }
  ]);
  const report = render(buildGraph(), [], warnings);
  assert.deepEqual(report.warnings, warnings);
  assert.equal(report.summary.counts.ERROR, 3);
});

test("an empty graph renders an empty report", () => {
  const report = render(createGraphBuilder().build(), []);
  assert.deepEqual(report.sinks, []);
  assert.equal(report.summary.totalSinks, 0);
  assert.equal(report.summary.totalPaths, 0);
});
