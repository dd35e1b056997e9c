import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { envName, readEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_TIMEOUT_MS,
  OUTPUT_FORMATS,
  STATE_DIR_NAME,
  defaultConcurrency,
  type OutputFormat
} from "./defaults.js";
import { isRateLimiterAsGateEnabled, isStrictOrphansEnabled } from "./featureFlags.js";
import {
  DEFAULT_MAX_PATHS_PER_SINK,
  DEFAULT_MAX_REVISITS,
  DEFAULT_MAX_STEPS_PER_SINK
} from "../paths/enumerate.js";
import { DEFAULT_CLASSIFICATION_POLICY } from "../verdict/policy.js";
import type { ClassificationPolicy } from "../types/domain/verdict.js";
import { ConfigFileParseError, ConfigInvalidValueError } from "../errors/config.errors.js";

export interface TaintPathConfig {
  projectRoot: string;
  stateDir: string;
  policy: ClassificationPolicy;
  enumeration: {
    maxRevisits: number;
    maxPathsPerSink: number;
    maxStepsPerSink: number;
  };
  run: {
    concurrency: number;
    timeoutMs: number;
    strictOrphans: boolean;
  };
  output: {
    format: OutputFormat;
  };
}

export type ConfigOverrides = {
  policy?: Partial<ClassificationPolicy>;
  enumeration?: Partial<TaintPathConfig["enumeration"]>;
  run?: Partial<TaintPathConfig["run"]>;
  output?: Partial<TaintPathConfig["output"]>;
};

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: ConfigOverrides;
}

type ConfigSection = Record<string, unknown>;

const PARTIAL_VERDICT_CHOICES = ["GOOD_TO_FIX", "MUST_FIX"] as const;
const AUTH_VERDICT_CHOICES = ["FALSE_POSITIVE", "GOOD_TO_FIX"] as const;

function toSection(value: unknown, key: string): ConfigSection {
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigInvalidValueError(key, value, "an object");
  }
  return Object.fromEntries(Object.entries(value));
}

function parseInteger(key: string, value: unknown, min: number): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const num = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof num !== "number" || !Number.isInteger(num) || num < min) {
    throw new ConfigInvalidValueError(key, value, `an integer >= ${min}`);
  }
  return num;
}

function parseBoolean(key: string, value: unknown): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigInvalidValueError(key, value, "true or false");
  }
  return value;
}

function parseChoice<T extends string>(key: string, value: unknown, choices: readonly T[]): T | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : null;
  const resolved = choices.find((choice) => choice.toLowerCase() === normalized);
  if (!resolved) {
    throw new ConfigInvalidValueError(key, value, choices.join(" | "));
  }
  return resolved;
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<ConfigSection> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigFileParseError(candidate, message);
    }
    return toSection(parsed, candidate);
  }

  return {};
}

/**
 * Resolves configuration from, lowest to highest precedence: defaults, the JSON
 * config file, TAINTPATH_* environment variables, then explicit overrides.
 */
export async function loadConfig(params: LoadConfigParams): Promise<TaintPathConfig> {
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);
  const filePolicy = toSection(configFile.policy, "policy");
  const fileEnumeration = toSection(configFile.enumeration, "enumeration");
  const fileRun = toSection(configFile.run, "run");
  const fileOutput = toSection(configFile.output, "output");
  const overrides = params.overrides ?? {};

  const policy: ClassificationPolicy = {
    partiallyMitigatedVerdict:
      parseChoice(envName("PARTIAL_VERDICT"), readEnv("PARTIAL_VERDICT"), PARTIAL_VERDICT_CHOICES) ??
      parseChoice("policy.partiallyMitigatedVerdict", filePolicy.partiallyMitigatedVerdict, PARTIAL_VERDICT_CHOICES) ??
      DEFAULT_CLASSIFICATION_POLICY.partiallyMitigatedVerdict,
    authProtectedVerdict:
      parseChoice(envName("AUTH_VERDICT"), readEnv("AUTH_VERDICT"), AUTH_VERDICT_CHOICES) ??
      parseChoice("policy.authProtectedVerdict", filePolicy.authProtectedVerdict, AUTH_VERDICT_CHOICES) ??
      DEFAULT_CLASSIFICATION_POLICY.authProtectedVerdict,
    rateLimiterAsAuthzGate:
      isRateLimiterAsGateEnabled() ??
      parseBoolean("policy.rateLimiterAsAuthzGate", filePolicy.rateLimiterAsAuthzGate) ??
      DEFAULT_CLASSIFICATION_POLICY.rateLimiterAsAuthzGate
  };

  const cfg: TaintPathConfig = {
    projectRoot: params.projectRoot,
    stateDir: path.join(params.projectRoot, STATE_DIR_NAME),
    policy: { ...policy, ...overrides.policy },
    enumeration: {
      maxRevisits:
        parseInteger(envName("MAX_REVISITS"), readEnv("MAX_REVISITS"), 0) ??
        parseInteger("enumeration.maxRevisits", fileEnumeration.maxRevisits, 0) ??
        DEFAULT_MAX_REVISITS,
      maxPathsPerSink:
        parseInteger(envName("MAX_PATHS_PER_SINK"), readEnv("MAX_PATHS_PER_SINK"), 1) ??
        parseInteger("enumeration.maxPathsPerSink", fileEnumeration.maxPathsPerSink, 1) ??
        DEFAULT_MAX_PATHS_PER_SINK,
      maxStepsPerSink:
        parseInteger(envName("MAX_STEPS_PER_SINK"), readEnv("MAX_STEPS_PER_SINK"), 1) ??
        parseInteger("enumeration.maxStepsPerSink", fileEnumeration.maxStepsPerSink, 1) ??
        DEFAULT_MAX_STEPS_PER_SINK,
      ...overrides.enumeration
    },
    run: {
      concurrency:
        parseInteger(envName("CONCURRENCY"), readEnv("CONCURRENCY"), 1) ??
        parseInteger("run.concurrency", fileRun.concurrency, 1) ??
        defaultConcurrency(),
      timeoutMs:
        parseInteger(envName("TIMEOUT_MS"), readEnv("TIMEOUT_MS"), 0) ??
        parseInteger("run.timeoutMs", fileRun.timeoutMs, 0) ??
        DEFAULT_TIMEOUT_MS,
      strictOrphans:
        isStrictOrphansEnabled() ?? parseBoolean("run.strictOrphans", fileRun.strictOrphans) ?? false,
      ...overrides.run
    },
    output: {
      format: parseChoice("output.format", fileOutput.format, OUTPUT_FORMATS) ?? "json",
      ...overrides.output
    }
  };

  return cfg;
}
