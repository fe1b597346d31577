import { ERROR_CATALOG, type CodesForBase, type ErrorDomain } from "../catalog.js";
import { LoadTraceError } from "../base.js";
import type { LoadTraceErrorOptions } from "../types.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by a failing dependency (log sink, exporter, host service).
 * The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCode> extends LoadTraceError {
  readonly _tag = "ExternalError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(opts: LoadTraceErrorOptions<C>) {
    super(
      opts.message,
      opts.metadata,
      opts.traceId,
      opts.cause !== undefined ? { cause: opts.cause } : undefined,
    );
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
