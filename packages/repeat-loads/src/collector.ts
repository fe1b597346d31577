import { getRequestContext, type StackFrame, tryGetRequestContext } from "@loadtrace/core";
import { getErrorMessage } from "@loadtrace/errors";
import { buildCallSite } from "./call-site.js";
import { LOG_TAG } from "./constants.js";
import { LoadLog } from "./load-log.js";
import { buildReport, filterRepeated } from "./report.js";
import { isLogActive, resolveLogFile } from "./settings.js";
import { recordReportTelemetry } from "./telemetry.js";
import type { CollectorState, LoadLogSnapshot, ResolvedLoadTraceOptions } from "./types.js";

/**
 * Request-scoped repeated load collector.
 *
 * - `record()` runs once per entity load and never throws
 * - `flush()` runs once at end of request and writes the report when
 *   diagnostics and logging are on and at least one entity repeated
 * - after `flush()` the collector is done: later records and flushes are ignored
 *
 * The report header uses the URL of the active request context unless a
 * `currentUrl` getter is given.
 */
export class RepeatedLoadCollector {
  private readonly options: ResolvedLoadTraceOptions;
  private readonly currentUrl: () => string;
  private readonly log = new LoadLog();
  private _state: CollectorState = "created";

  constructor(options: ResolvedLoadTraceOptions, currentUrl?: () => string) {
    this.options = options;
    this.currentUrl = currentUrl ?? (() => getRequestContext().url);
  }

  get state(): CollectorState {
    return this._state;
  }

  get totalLoaded(): number {
    return this.log.totalLoaded;
  }

  /** Unfiltered copy of everything recorded so far */
  snapshot(): LoadLogSnapshot {
    return this.log.snapshot();
  }

  /** Whether `record()` would currently accept a load */
  isRecording(): boolean {
    return this._state === "created" && isLogActive(this.options.config);
  }

  record(typeName: string, identifier: string, callStack: readonly StackFrame[]): void {
    if (typeName === "" || !this.isRecording()) return;

    this.log.append(typeName, identifier, buildCallSite(callStack));
  }

  /**
   * Emit the report. Sink and log-file configuration errors propagate;
   * the request scope turns them into LoadTraceReportError.
   */
  flush(): void {
    if (this._state !== "created") return;
    this._state = "flushing";

    try {
      if (!this.options.diagnosticsEnabled()) return;
      if (!isLogActive(this.options.config)) return;

      const repeated = filterRepeated(this.log.snapshot());
      if (repeated.size === 0) return;

      const logFile = resolveLogFile(this.options.config);
      const report = buildReport({
        url: this.currentUrl(),
        totalLoaded: this.log.totalLoaded,
        repeated,
        rootDir: this.options.rootDir,
      });
      this.options.sink.append(report, logFile);
      this.emitTelemetry(repeated);
    } finally {
      this._state = "done";
    }
  }

  /** Telemetry is secondary to the report; failures are only logged */
  private emitTelemetry(repeated: LoadLogSnapshot): void {
    try {
      recordReportTelemetry(this.log.totalLoaded, repeated);
    } catch (error) {
      const requestId = tryGetRequestContext()?.requestId;
      const prefix = requestId !== undefined ? `[${LOG_TAG}] Request ${requestId}:` : `[${LOG_TAG}]`;
      console.warn(`${prefix} Telemetry failed: ${getErrorMessage(error)}`);
    }
  }
}
