/** Config store paths read on every record/flush */
export const CONFIG_PATHS = {
  LOG_ACTIVE: "dev/aoe_modelcache/log_active",
  LOG_FILE: "dev/aoe_modelcache/log_file",
} as const;

/** Log file used when `log_file` is unset or blank */
export const DEFAULT_LOG_FILE = "repeated-loads.log";

/** Environment variable acting as the process-wide diagnostics gate */
export const DIAGNOSTICS_ENV_VAR = "LOADTRACE_PROFILER";

/**
 * Innermost frames between the real caller and the collector: observer,
 * dispatcher emit and the data layer's load plumbing. Tied to the shape of
 * the dispatch path; a host with a deeper or shallower chain sees shifted
 * call sites.
 */
export const DISPATCH_FRAME_SKIP = 5;

/** Frames kept per call site, starting at DISPATCH_FRAME_SKIP */
export const MAX_CONTEXT_FRAMES = 3;

/** Placeholder for frames (or whole call sites) without a file */
export const UNKNOWN_LOCATION = "unknown";

/** Width of the `---- url ----` report header */
export const REPORT_HEADER_WIDTH = 220;

export const REPORT_HEADER_FILL = "-";

/** Tag prefixed to console warnings */
export const LOG_TAG = "repeat-loads";
