import { availableParallelism } from "node:os";

export const STATE_DIR_NAME = ".taintpath";

export const CONFIG_FILE_NAMES = ["taintpath.config.json", ".taintpathrc.json"];

export const DEFAULT_TIMEOUT_MS = 30_000;

export const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}
