#!/usr/bin/env node
import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import pc from "picocolors";
import { loadConfig, type ConfigOverrides } from "./config/loadConfig.js";
import { OUTPUT_FORMATS, type OutputFormat } from "./config/defaults.js";
import { loadGraphFile } from "./graph/ingest.js";
import { runClassification } from "./run/runClassification.js";
import { formatReportJson, formatReportText } from "./report/formatters.js";
import { createAppLogger, noopLogger, type AppLogger, type Logger } from "./logging/logger.js";
import { isMalformedGraphError } from "./errors/graph.errors.js";
import type { ClassifyProgressEvent } from "./run/progress.js";

const EXIT_OK = 0;
const EXIT_INTERNAL_ERROR = 1;
const EXIT_MALFORMED_GRAPH = 2;

const program = new Command();

class Spinner {
  private frames = ["-", "\\", "|", "/"];
  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private text = "";

  constructor(private stream: { isTTY?: boolean; write: (chunk: string) => void }) {}

  start(text: string) {
    this.text = text;
    if (!this.stream.isTTY) return;
    if (this.timer) return;
    this.render();
    this.timer = setInterval(() => this.render(), 120);
  }

  update(text: string) {
    this.text = text;
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.stream.write("\r\x1b[2K");
  }

  private render() {
    const frame = this.frames[this.frameIndex % this.frames.length];
    this.frameIndex += 1;
    this.stream.write(`\r\x1b[2K${frame} ${this.text}`);
  }
}

function parseIntAtLeast(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

function parseFormat(value: string): OutputFormat {
  const match = OUTPUT_FORMATS.find((format) => format === value.trim().toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(", ")}.`);
  }
  return match;
}

function describeProgress(event: ClassifyProgressEvent): string {
  if (event.phase === "roles") return `Classified ${event.total} node roles`;
  return `Sinks ${Math.min(event.current, event.total)}/${event.total}`;
}

type ClassifyOptions = {
  graph: string;
  out?: string;
  format?: OutputFormat;
  config?: string;
  concurrency?: number;
  timeout?: number;
  maxRevisits?: number;
  maxPaths?: number;
  strictOrphans?: boolean;
  debug?: boolean;
};

function buildOverrides(options: ClassifyOptions): ConfigOverrides {
  return {
    enumeration: {
      ...(options.maxRevisits !== undefined ? { maxRevisits: options.maxRevisits } : {}),
      ...(options.maxPaths !== undefined ? { maxPathsPerSink: options.maxPaths } : {})
    },
    run: {
      ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
      ...(options.timeout !== undefined ? { timeoutMs: options.timeout } : {}),
      ...(options.strictOrphans ? { strictOrphans: true } : {})
    },
    output: options.format ? { format: options.format } : {}
  };
}

async function runClassifyCommand(options: ClassifyOptions): Promise<number> {
  const projectRoot = process.cwd();
  const progressSpinner = process.stderr.isTTY ? new Spinner(process.stderr) : null;

  let appLogger: AppLogger | null = null;
  const config = await loadConfig({
    projectRoot,
    configPath: options.config,
    overrides: buildOverrides(options)
  });
  try {
    appLogger = await createAppLogger({
      stateDir: config.stateDir,
      minLevel: options.debug ? "debug" : "info"
    });
  } catch {
    appLogger = null;
  }
  const appLog = appLogger ?? noopLogger;

  // Everything human-facing goes to stderr so stdout stays a clean report stream.
  const uiLogger: Logger = {
    debug: (message, meta) => appLog.debug(message, meta),
    info: (message, meta) => appLog.info(message, meta),
    warn: (message, meta) => {
      appLog.warn(message, meta);
      progressSpinner?.stop();
      console.error(pc.yellow(message));
    },
    error: (message, meta) => {
      appLog.error(message, meta);
      progressSpinner?.stop();
      console.error(pc.red(message));
    }
  };

  try {
    const graphPath = path.resolve(projectRoot, options.graph);
    uiLogger.info("Loading graph", { graphPath });
    const graph = await loadGraphFile(graphPath);
    progressSpinner?.start("Classifying...");

    const { report, durationMs } = await runClassification(graph, {
      policy: config.policy,
      enumeration: config.enumeration,
      concurrency: config.run.concurrency,
      timeoutMs: config.run.timeoutMs,
      strictOrphans: config.run.strictOrphans,
      logger: uiLogger,
      onProgress: (event) => progressSpinner?.update(describeProgress(event))
    });
    progressSpinner?.stop();

    const output = config.output.format === "text" ? formatReportText(report) : formatReportJson(report);
    if (options.out) {
      const outPath = path.resolve(projectRoot, options.out);
      await mkdir(path.dirname(outPath), { recursive: true });
      await writeFile(outPath, `${output}\n`, "utf-8");
      console.error(
        pc.dim(`Wrote ${report.summary.totalSinks} sink verdict(s) to ${outPath} in ${durationMs}ms.`)
      );
    } else {
      process.stdout.write(`${output}\n`);
    }
    return EXIT_OK;
  } catch (err) {
    progressSpinner?.stop();
    const message = err instanceof Error ? err.message : String(err);
    uiLogger.error(`Error: ${message}`);
    return isMalformedGraphError(err) ? EXIT_MALFORMED_GRAPH : EXIT_INTERNAL_ERROR;
  } finally {
    if (appLogger) {
      await appLogger.close();
    }
  }
}

program
  .name("taintpath")
  .description("Classify source-to-sink taint paths in an annotated call graph")
  .version("0.1.0");

program
  .command("classify")
  .description("Classify every sink of a call graph and write the report")
  .requiredOption("-g, --graph <file>", "Call graph JSON file")
  .option("-o, --out <file>", "Write the report to a file instead of stdout")
  .option("-f, --format <format>", "Output format (json|text)", parseFormat)
  .option("-c, --config <path>", "Path to taintpath.config.json")
  .option("--concurrency <num>", "Sinks classified concurrently", parseIntAtLeast(1))
  .option("--timeout <ms>", "Abort the run after this many milliseconds (0 disables)", parseIntAtLeast(0))
  .option("--max-revisits <num>", "Extra occurrences of a node allowed on one path", parseIntAtLeast(0))
  .addOption(
    new Option("--max-paths <num>", "Stop enumerating a sink after this many paths")
      .argParser(parseIntAtLeast(1))
      .hideHelp()
  )
  .option("--strict-orphans", "Abort when a sink has no incoming edge")
  .option("--debug", "Write debug entries to the run log")
  .action(async (options: ClassifyOptions) => {
    process.exitCode = await runClassifyCommand(options);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(pc.red(`Error: ${message}`));
  process.exitCode = EXIT_INTERNAL_ERROR;
});
