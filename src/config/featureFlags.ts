import { envName, readEnvFlag } from "./env.js";

export const STRICT_ORPHANS_FLAG = envName("STRICT_ORPHANS");
export const RATE_LIMITER_AS_GATE_FLAG = envName("RATE_LIMITER_AS_GATE");

/** Orphaned sinks abort the run instead of being reported as per-sink errors. */
export function isStrictOrphansEnabled(): boolean | null {
  return readEnvFlag("STRICT_ORPHANS");
}

export function isRateLimiterAsGateEnabled(): boolean | null {
  return readEnvFlag("RATE_LIMITER_AS_GATE");
}
