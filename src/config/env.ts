export const ENV_PREFIX = "TAINTPATH_";

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);
const FALSY = new Set(["0", "false", "no", "n", "off"]);

export function envName(key: string): string {
  return `${ENV_PREFIX}${key}`;
}

/** Trimmed value of `TAINTPATH_<key>`; null when unset or blank. */
export function readEnv(key: string): string | null {
  const value = process.env[envName(key)]?.trim();
  return value ? value : null;
}

/** Boolean view of `TAINTPATH_<key>`; null when unset or not a recognised switch. */
export function readEnvFlag(key: string): boolean | null {
  const value = readEnv(key)?.toLowerCase();
  if (!value) return null;
  if (TRUTHY.has(value)) return true;
  if (FALSY.has(value)) return false;
  return null;
}
