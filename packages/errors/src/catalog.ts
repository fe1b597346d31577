/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the loadtrace packages. Each code maps to a
 * base error type, a domain, and whether the condition is expected
 * (caller/config mistake) or not (bug, failing dependency).
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // LOAD TRACE ERRORS - Repeated load tracking
  // ============================================================================
  LOAD_TRACE_CONFIGURATION_INVALID: {
    domain: "loadtrace",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Load trace configuration invalid",
    description: "A load trace setting or option has an invalid value",
  },
  LOAD_TRACE_REPORT_FAILED: {
    domain: "loadtrace",
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Load trace report failed",
    description: "The repeated load report could not be written to its log sink",
  },
  LOAD_TRACE_SCOPE_MISSING: {
    domain: "loadtrace",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "No active load trace scope",
    description: "A collector was requested outside of a request scope",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
