import type { ConfigReader, ConfigValue } from "./host-types.js";

/**
 * In-memory config reader. Lookups return `undefined` for unknown paths.
 */
export function createMapConfig(values: Readonly<Record<string, ConfigValue>>): ConfigReader {
  const entries = new Map<string, ConfigValue>(Object.entries(values));
  return {
    getValue: (path) => entries.get(path),
  };
}

/**
 * Map a config path to an environment variable name.
 * e.g. "dev/aoe_modelcache/log_file" → "DEV_AOE_MODELCACHE_LOG_FILE"
 */
export function configPathToEnvVar(path: string): string {
  return path
    .split("/")
    .filter((segment) => segment.length > 0)
    .join("_")
    .replace(/[^A-Za-z0-9_]/g, "_")
    .toUpperCase();
}

/**
 * Config reader backed by environment variables.
 * Reads are live, so toggling a variable takes effect on the next lookup.
 */
export function createEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigReader {
  return {
    getValue: (path) => env[configPathToEnvVar(path)],
  };
}
