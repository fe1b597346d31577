import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Serialized form of a LoadTraceError (see `LoadTraceError.toJSON`).
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
  readonly timestamp: string;
}

/**
 * Root of the loadtrace error hierarchy.
 *
 * Concrete classes fix `_tag` (one of the base types) and `code` (a catalog
 * key); everything else is looked up from `ERROR_CATALOG`.
 */
export abstract class LoadTraceError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
    };
  }
}
