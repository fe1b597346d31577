import { DIAGNOSTICS_ENV_VAR } from "./constants.js";

/**
 * Check the process-wide diagnostics gate.
 *
 * Returns true only when LOADTRACE_PROFILER is explicitly "true" or "1".
 */
export function isDiagnosticsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[DIAGNOSTICS_ENV_VAR];
  return value === "true" || value === "1";
}
