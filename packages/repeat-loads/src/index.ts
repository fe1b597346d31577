/**
 * @loadtrace/repeat-loads — detect entities loaded more than once per request.
 *
 * Public API:
 * - runWithLoadTrace() / RequestLoadScope — request scope + end-of-request report
 * - createModelLoadObserver() — handler for the data layer's load events
 * - withRepeatedLoadTracking() — node:http request listener wrapper
 * - RepeatedLoadCollector — record()/flush() for hosts managing scopes themselves
 */

export { buildCallSite, formatFrame } from "./call-site.js";
export { RepeatedLoadCollector } from "./collector.js";
export {
  CONFIG_PATHS,
  DEFAULT_LOG_FILE,
  DIAGNOSTICS_ENV_VAR,
  DISPATCH_FRAME_SKIP,
  MAX_CONTEXT_FRAMES,
  REPORT_HEADER_WIDTH,
} from "./constants.js";
export { isDiagnosticsEnabled } from "./diagnostics.js";
export { requestUrl, type TrackedRequest, type TrackedResponse, withRepeatedLoadTracking } from "./http.js";
export { LoadLog } from "./load-log.js";
export { createModelLoadObserver, entityTypeName } from "./observer.js";
export {
  buildReport,
  centerPad,
  filterRepeated,
  formatHeader,
  formatSummary,
  type ReportInput,
  stripRootDir,
} from "./report.js";
export {
  getActiveCollector,
  RequestLoadScope,
  runWithLoadTrace,
  tryGetActiveCollector,
} from "./scope.js";
export {
  isLogActive,
  type LoadTraceSettings,
  resolveLoadTraceOptions,
  resolveLoadTraceSettings,
  resolveLogFile,
  validateLoadTraceOptions,
} from "./settings.js";
export { recordReportTelemetry } from "./telemetry.js";
export type {
  CollectorState,
  LoadLogSnapshot,
  LoadTraceOptions,
  LoadTraceRequest,
  ModelLoadObserverOptions,
  ResolvedLoadTraceOptions,
} from "./types.js";

export const PACKAGE_NAME = "@loadtrace/repeat-loads";
