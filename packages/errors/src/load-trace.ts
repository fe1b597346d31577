/**
 * Load trace errors — repeated model load tracking
 *
 * Concrete:
 *   - LoadTraceConfigurationError (LOAD_TRACE_CONFIGURATION_INVALID)
 *   - LoadTraceReportError (LOAD_TRACE_REPORT_FAILED)
 *   - LoadTraceScopeError (LOAD_TRACE_SCOPE_MISSING)
 */

import { ExternalError } from "./bases/external-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

export class LoadTraceConfigurationError extends ValidationError<"LOAD_TRACE_CONFIGURATION_INVALID"> {
  constructor(message: string, issues?: readonly ValidationIssue[]) {
    super({
      code: "LOAD_TRACE_CONFIGURATION_INVALID",
      message: `Load trace configuration invalid: ${message}`,
      ...(issues !== undefined ? { issues } : {}),
    });
  }
}

export class LoadTraceReportError extends ExternalError<"LOAD_TRACE_REPORT_FAILED"> {
  readonly requestId: string;

  constructor(requestId: string, cause: Error) {
    super({
      code: "LOAD_TRACE_REPORT_FAILED",
      message: `Repeated load report for request ${requestId} failed: ${cause.message}`,
      metadata: { requestId },
      cause,
    });
    this.requestId = requestId;
  }
}

export class LoadTraceScopeError extends NotFoundError<"LOAD_TRACE_SCOPE_MISSING"> {
  constructor() {
    super({
      code: "LOAD_TRACE_SCOPE_MISSING",
      message:
        "No active load trace scope: the collector was requested outside a request. " +
        "Wrap request handling with runWithLoadTrace().",
    });
  }
}
