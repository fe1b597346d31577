/**
 * Config store lookups and option resolution.
 */

import path from "node:path";
import type { ConfigReader } from "@loadtrace/core";
import { LoadTraceConfigurationError, type LoadTraceReportError } from "@loadtrace/errors";
import { z } from "zod";
import { CONFIG_PATHS, DEFAULT_LOG_FILE, LOG_TAG } from "./constants.js";
import { isDiagnosticsEnabled } from "./diagnostics.js";
import type { LoadTraceOptions, ResolvedLoadTraceOptions } from "./types.js";

const FALSY_STRINGS = new Set(["", "0", "false"]);

/** Config flag: booleans as-is, numbers non-zero, strings unless "", "0" or "false" */
export const FlagSchema = z
  .union([z.boolean(), z.number(), z.string(), z.null(), z.undefined()])
  .transform((value) => {
    if (value === null || value === undefined) return false;
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    return !FALSY_STRINGS.has(value.trim().toLowerCase());
  });

/** Log file name relative to the sink's log directory */
export const LogFileSchema = z
  .string()
  .refine((file) => !file.includes("\0"), "log file must not contain NUL bytes")
  .refine(
    (file) => !file.split(/[\\/]/).includes(".."),
    "log file must not leave the log directory",
  )
  .nullish()
  .transform((file) =>
    file === null || file === undefined || file.trim() === "" ? DEFAULT_LOG_FILE : file,
  );

export interface LoadTraceSettings {
  readonly active: boolean;
  readonly logFile: string;
}

/** Read the master switch. Unparseable values (e.g. NaN) count as off. */
export function isLogActive(config: ConfigReader): boolean {
  const result = FlagSchema.safeParse(config.getValue(CONFIG_PATHS.LOG_ACTIVE));
  return result.success && result.data;
}

/**
 * Read the report destination.
 *
 * @throws {LoadTraceConfigurationError} if the configured value is not a usable file name
 */
export function resolveLogFile(config: ConfigReader): string {
  const result = LogFileSchema.safeParse(config.getValue(CONFIG_PATHS.LOG_FILE));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: CONFIG_PATHS.LOG_FILE,
      message: issue.message,
      code: issue.code,
    }));
    throw new LoadTraceConfigurationError(
      `${CONFIG_PATHS.LOG_FILE}: ${issues.map((i) => i.message).join("; ")}`,
      issues,
    );
  }
  return result.data;
}

export function resolveLoadTraceSettings(config: ConfigReader): LoadTraceSettings {
  return {
    active: isLogActive(config),
    logFile: resolveLogFile(config),
  };
}

/** Validate options, throw LoadTraceConfigurationError on invalid input */
export function validateLoadTraceOptions(options: LoadTraceOptions): void {
  if (options.rootDir !== undefined) {
    if (options.rootDir.trim() === "") {
      throw new LoadTraceConfigurationError("rootDir must not be empty", [
        { field: "rootDir", message: "must not be empty", code: "too_small" },
      ]);
    }
    if (!path.isAbsolute(options.rootDir)) {
      throw new LoadTraceConfigurationError(
        `rootDir must be an absolute path, got "${options.rootDir}"`,
        [{ field: "rootDir", message: "must be absolute", code: "custom", value: options.rootDir }],
      );
    }
  }
}

/** Ensure a directory prefix ends with exactly one trailing separator */
function withTrailingSeparator(dir: string): string {
  return dir.endsWith("/") || dir.endsWith(path.sep) ? dir : `${dir}${path.sep}`;
}

function warnReportFailure(error: LoadTraceReportError): void {
  console.warn(`[${LOG_TAG}] Request ${error.requestId}: ${error.message}`);
}

/** Validate and resolve user options with defaults */
export function resolveLoadTraceOptions(options: LoadTraceOptions): ResolvedLoadTraceOptions {
  validateLoadTraceOptions(options);
  return {
    config: options.config,
    sink: options.sink,
    rootDir: withTrailingSeparator(options.rootDir ?? process.cwd()),
    diagnosticsEnabled: options.diagnosticsEnabled ?? (() => isDiagnosticsEnabled()),
    onError: options.onError ?? warnReportFailure,
  };
}
