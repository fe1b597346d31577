import { ERROR_CATALOG, type CodesForBase, type ErrorDomain } from "../catalog.js";
import { LoadTraceError } from "../base.js";
import type { LoadTraceErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

type ValidationErrorOptions<C extends ValidationCode> = LoadTraceErrorOptions<C> & {
  issues?: readonly ValidationIssue[];
};

/**
 * Errors caused by invalid input, configuration, or options.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode> extends LoadTraceError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(opts: ValidationErrorOptions<C>) {
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
    this.issues = opts.issues ?? [];
  }
}
