import assert from "node:assert/strict";
import { test } from "node:test";
import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { createAppLogger, withContext, type LogMeta, type Logger } from "../logger.js";

test("createAppLogger writes JSON lines at or above the minimum level", async (t) => {
  const stateDir = await mkdtemp(path.join(os.tmpdir(), "taintpath-log-"));
  t.after(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  const logger = await createAppLogger({ stateDir, label: "unit", minLevel: "info" });
  assert.equal(path.dirname(logger.path), path.join(stateDir, "logs"));
  assert.ok(path.basename(logger.path).startsWith("unit-"));

  logger.debug("hidden");
  logger.info("Classifying sinks", { sinks: 2 });
  logger.warn("odd tag", { nodeId: "n1" });
  await logger.close();
  logger.error("after close");

  const lines = (await readFile(logger.path, "utf-8")).trim().split("\n");
  const entries = lines.map((line) => JSON.parse(line));
  assert.deepEqual(
    entries.map((entry) => [entry.level, entry.message, entry.meta]),
    [
      ["info", "Classifying sinks", { sinks: 2 }],
      ["warning", "odd tag", { nodeId: "n1" }]
    ]
  );
});

test("withContext merges context into every entry", () => {
  const seen: LogMeta[] = [];
  const base: Logger = {
    debug: (_message, meta) => seen.push(meta ?? {}),
    info: (_message, meta) => seen.push(meta ?? {}),
    warn: (_message, meta) => seen.push(meta ?? {}),
    error: (_message, meta) => seen.push(meta ?? {})
  };
  const scoped = withContext(base, { sinkId: "s1" });
  scoped.info("one");
  scoped.error("two", { reason: "x", sinkId: "override" });
  assert.deepEqual(seen, [{ sinkId: "s1" }, { reason: "x", sinkId: "override" }]);
});
