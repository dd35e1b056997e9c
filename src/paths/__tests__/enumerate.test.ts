import assert from "node:assert/strict";
import { test } from "node:test";
import { enumeratePaths, enumerateSinkPaths, isLivePath } from "../enumerate.js";
import { classifyGraph, type ClassifiedGraph } from "../../classify/roles.js";
import { createGraphBuilder } from "../../graph/callGraph.js";
import { BranchCondition, NodeKind } from "../../types/domain/graph.js";
import { UnknownSinkError } from "../../errors/classification.errors.js";

const nodesOf = (classified: ClassifiedGraph, sinkId: string, maxRevisits?: number): string[][] =>
  Array.from(enumeratePaths(classified, sinkId, { maxRevisits }), (path) => path.nodes);

const diamond = (): ClassifiedGraph =>
  classifyGraph(
    createGraphBuilder()
      .addNode({ id: "e1", kind: NodeKind.EntryPoint })
      .addNode({ id: "e2", kind: NodeKind.EntryPoint })
      .addNode({ id: "a", kind: NodeKind.Call })
      .addNode({ id: "b", kind: NodeKind.Call })
      .addNode({ id: "s", kind: NodeKind.Sink })
      .addEdge("e1", "a")
      .addEdge("e1", "b")
      .addEdge("a", "s")
      .addEdge("b", "s")
      .addEdge("e2", "s")
      .markEntryRegistered("e1")
      .markEntryRegistered("e2")
      .build()
  );

test("paths follow entry declaration order, then edge declaration order", () => {
  assert.deepEqual(nodesOf(diamond(), "s"), [
    ["e1", "a", "s"],
    ["e1", "b", "s"],
    ["e2", "s"]
  ]);
});

test("enumeration is lazy and restartable", () => {
  const classified = diamond();
  const paths = enumeratePaths(classified, "s");

  const first: string[][] = [];
  for (const path of paths) {
    first.push(path.nodes);
    break;
  }
  assert.deepEqual(first, [["e1", "a", "s"]]);

  const all = Array.from(paths, (path) => path.nodes);
  assert.equal(all.length, 3);
  assert.deepEqual(Array.from(paths, (path) => path.nodes), all);
});

const cyclic = (): ClassifiedGraph =>
  classifyGraph(
    createGraphBuilder()
      .addNode({ id: "e", kind: NodeKind.EntryPoint })
      .addNode({ id: "a", kind: NodeKind.Call })
      .addNode({ id: "b", kind: NodeKind.Call })
      .addNode({ id: "s", kind: NodeKind.Sink })
      .addEdge("e", "a")
      .addEdge("a", "b")
      .addEdge("b", "a", BranchCondition.Runtime)
      .addEdge("b", "s")
      .markEntryRegistered("e")
      .build()
  );

test("cycles are unrolled up to the revisit cap and the cut edge is recorded", () => {
  const paths = Array.from(enumeratePaths(cyclic(), "s"));
  assert.deepEqual(
    paths.map((path) => path.nodes),
    [
      ["e", "a", "b", "a", "b", "s"],
      ["e", "a", "b", "s"]
    ]
  );
  assert.deepEqual(paths[0]?.conditions, ["Always", "Always", "Runtime", "Always", "Always"]);
  assert.deepEqual(paths[0]?.truncations, [{ nodeId: "a", via: "b" }]);
  assert.deepEqual(paths[1]?.truncations, []);
});

test("a revisit cap of zero forbids any repeated node", () => {
  const paths = Array.from(enumeratePaths(cyclic(), "s", { maxRevisits: 0 }));
  assert.deepEqual(
    paths.map((path) => path.nodes),
    [["e", "a", "b", "s"]]
  );
  assert.deepEqual(paths[0]?.truncations, [{ nodeId: "a", via: "b" }]);
});

test("a Never edge contributes a single dead witness path", () => {
  const classified = classifyGraph(
    createGraphBuilder()
      .addNode({ id: "e", kind: NodeKind.EntryPoint })
      .addNode({ id: "g", kind: NodeKind.Branch })
      .addNode({ id: "x", kind: NodeKind.Call })
      .addNode({ id: "y", kind: NodeKind.Call })
      .addNode({ id: "z", kind: NodeKind.Call })
      .addNode({ id: "s", kind: NodeKind.Sink })
      .addEdge("e", "g")
      .addEdge("g", "x", BranchCondition.Never)
      .addEdge("x", "y")
      .addEdge("x", "z")
      .addEdge("y", "s")
      .addEdge("z", "s")
      .addEdge("g", "s")
      .markEntryRegistered("e")
      .build()
  );

  const paths = Array.from(enumeratePaths(classified, "s"));
  assert.deepEqual(
    paths.map((path) => path.nodes),
    [
      ["e", "g", "x", "y", "s"],
      ["e", "g", "s"]
    ]
  );
  assert.deepEqual(paths[0]?.conditions, ["Always", "Never", "Always", "Always"]);
  assert.equal(paths[0] ? isLivePath(paths[0]) : true, false);
  assert.equal(paths[1] ? isLivePath(paths[1]) : false, true);
});

test("edges leaving a DeadGuard are treated as Never", () => {
  const classified = classifyGraph(
    createGraphBuilder()
      .addNode({ id: "e", kind: NodeKind.EntryPoint })
      .addNode({ id: "flag", kind: NodeKind.Branch, roleTags: ["dead-guard"] })
      .addNode({ id: "s", kind: NodeKind.Sink })
      .addEdge("e", "flag")
      .addEdge("flag", "s")
      .markEntryRegistered("e")
      .build()
  );

  const [path] = Array.from(enumeratePaths(classified, "s"));
  assert.deepEqual(path?.conditions, ["Always", "Never"]);
});

test("paths from unregistered entry points are marked as such", () => {
  const classified = classifyGraph(
    createGraphBuilder()
      .addNode({ id: "internal", kind: NodeKind.EntryPoint })
      .addNode({ id: "s", kind: NodeKind.Sink })
      .addEdge("internal", "s")
      .build()
  );

  const [path] = Array.from(enumeratePaths(classified, "s"));
  assert.equal(path?.entryRegistered, false);
  assert.equal(path?.entryId, "internal");
  assert.equal(path?.sinkId, "s");
  assert.equal(path ? isLivePath(path) : true, false);
});

test("path limit stops enumeration and is reported", () => {
  const limited = enumerateSinkPaths(diamond(), "s", { maxPathsPerSink: 2 });
  assert.equal(limited.paths.length, 2);
  assert.equal(limited.limitReached, true);

  const exact = enumerateSinkPaths(diamond(), "s", { maxPathsPerSink: 3 });
  assert.equal(exact.paths.length, 3);
  assert.equal(exact.limitReached, false);

  assert.equal(Array.from(enumeratePaths(diamond(), "s", { maxPathsPerSink: 1 })).length, 1);
});

test("enumerating a non-sink node is rejected", () => {
  assert.throws(() => enumeratePaths(diamond(), "a"), UnknownSinkError);
  assert.throws(() => enumerateSinkPaths(diamond(), "missing"), UnknownSinkError);
});

// e -> c0, a complete directed cluster c0..c(size-1), and optionally every ci -> s.
const clustered = (size: number, clusterReachesSink: boolean): ClassifiedGraph => {
  const builder = createGraphBuilder()
    .addNode({ id: "e", kind: NodeKind.EntryPoint })
    .addNode({ id: "s", kind: NodeKind.Sink });
  for (let i = 0; i < size; i += 1) builder.addNode({ id: `c${i}`, kind: NodeKind.Call });
  builder.addEdge("e", "c0");
  for (let i = 0; i < size; i += 1) {
    for (let j = 0; j < size; j += 1) {
      if (i !== j) builder.addEdge(`c${i}`, `c${j}`);
    }
    if (clusterReachesSink) builder.addEdge(`c${i}`, "s");
  }
  builder.addEdge("e", "s").markEntryRegistered("e");
  return classifyGraph(builder.build());
};

test("subgraphs that cannot reach the sink are not explored", () => {
  const result = enumerateSinkPaths(clustered(8, false), "s", { maxStepsPerSink: 10 });
  assert.deepEqual(
    result.paths.map((path) => path.nodes),
    [["e", "s"]]
  );
  assert.deepEqual(result.paths[0]?.truncations, []);
  assert.equal(result.limitReached, false);
});

test("the step budget bounds the search and is reported", () => {
  const result = enumerateSinkPaths(clustered(6, true), "s", { maxStepsPerSink: 50 });
  assert.equal(result.limitReached, true);
  assert.ok(result.paths.length > 0);
  assert.ok(result.paths.length <= 50);
});

test("the deadline hook can abort a long search", () => {
  let checks = 0;
  assert.throws(
    () =>
      enumerateSinkPaths(clustered(6, true), "s", {
        checkDeadline: () => {
          checks += 1;
          if (checks === 2) throw new Error("out of time");
        }
      }),
    /out of time/
  );
  assert.equal(checks, 2);
});
