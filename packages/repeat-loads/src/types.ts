import type { ConfigReader, LogSink, StackProvider } from "@loadtrace/core";
import type { LoadTraceReportError } from "@loadtrace/errors";

/** Collector lifecycle: records accepted only while "created" */
export type CollectorState = "created" | "flushing" | "done";

/** type name → identifier → call sites in load order */
export type LoadLogSnapshot = ReadonlyMap<string, ReadonlyMap<string, readonly string[]>>;

/** Request description handed to a load trace scope */
export interface LoadTraceRequest {
  /** Request identifier used in warnings (default: random UUID) */
  readonly requestId?: string;
  /** Current URL, possibly HTML-entity encoded */
  readonly url: string;
}

/** Load tracing options */
export interface LoadTraceOptions {
  /** Config store holding the `dev/aoe_modelcache/*` keys */
  readonly config: ConfigReader;
  /** Destination for emitted reports */
  readonly sink: LogSink;
  /** Absolute prefix stripped from report locations (default: process.cwd()) */
  readonly rootDir?: string;
  /** Diagnostics gate (default: LOADTRACE_PROFILER env var) */
  readonly diagnosticsEnabled?: () => boolean;
  /** Receives report failures instead of console.warn */
  readonly onError?: (error: LoadTraceReportError) => void;
}

/** Fully resolved options (no optionals) */
export interface ResolvedLoadTraceOptions {
  readonly config: ConfigReader;
  readonly sink: LogSink;
  /** Always ends with a path separator */
  readonly rootDir: string;
  readonly diagnosticsEnabled: () => boolean;
  readonly onError: (error: LoadTraceReportError) => void;
}

/** Options for the load event observer */
export interface ModelLoadObserverOptions {
  /** Call-stack source (default: V8 stack capture) */
  readonly stack?: StackProvider;
}
