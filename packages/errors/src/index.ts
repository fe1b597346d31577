/**
 * @loadtrace/errors
 *
 * Shared error taxonomy for the loadtrace packages.
 *
 * Errors are built on 3 behavioral base types:
 * ValidationError, NotFoundError, ExternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, LoadTraceError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage, toError } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError } from "./bases/external-error.js";
export { NotFoundError } from "./bases/not-found-error.js";
export { ValidationError } from "./bases/validation-error.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ExternalCodes,
  LoadTraceErrorOptions,
  NotFoundCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  LoadTraceConfigurationError,
  LoadTraceReportError,
  LoadTraceScopeError,
} from "./load-trace.js";
