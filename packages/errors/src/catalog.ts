/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised across the linewise packages is listed here.
 * Each code maps to an HTTP status (the host request handler answers over
 * HTTP), a base error type and an `isExpected` flag.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, config, helper, completer
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIG ERRORS - Fatal at initialization, no degraded mode
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 500,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid completer configuration",
    description: "The completer configuration failed schema validation",
  },
  CONFIG_HELPER_BINARY_NOT_FOUND: {
    domain: "config",
    httpStatus: 500,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Helper binary not found",
    description: "The helper executable could not be located on disk or on PATH",
  },
  CONFIG_SOURCE_INDEX_NOT_FOUND: {
    domain: "config",
    httpStatus: 500,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Source index not found",
    description: "The source-index path is unset or does not exist",
  },

  // ============================================================================
  // HELPER ERRORS - External helper process liveness and transport
  // ============================================================================
  HELPER_NOT_RUNNING: {
    domain: "helper",
    httpStatus: 503,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Helper server not running",
    description: "The helper process has exited or was never started",
  },
  HELPER_STREAM_CLOSED: {
    domain: "helper",
    httpStatus: 503,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Helper output closed",
    description: "The helper closed its output before finishing a response",
  },
  HELPER_WRITE_FAILED: {
    domain: "helper",
    httpStatus: 503,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Helper write failed",
    description: "A request line could not be written to the helper's input pipe",
  },
  HELPER_RESPONSE_TIMEOUT: {
    domain: "helper",
    httpStatus: 504,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "Helper response timeout",
    description: "The helper did not finish a response within the configured deadline",
  },

  // ============================================================================
  // COMPLETER ERRORS - Query-level outcomes reported to the host
  // ============================================================================
  COMPLETER_DEFINITION_NOT_FOUND: {
    domain: "completer",
    httpStatus: 404,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Definition not found",
    description: "The helper returned no match for a go-to request",
  },
  COMPLETER_UNKNOWN_SUBCOMMAND: {
    domain: "completer",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Unknown subcommand",
    description: "The requested subcommand is not supported by this completer",
  },
  COMPLETER_REQUEST_INVALID: {
    domain: "completer",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid request",
    description: "The request context is missing or malformed",
  },
  COMPLETER_SCRATCH_WRITE_FAILED: {
    domain: "completer",
    httpStatus: 500,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Scratch file write failed",
    description: "The unsaved buffer could not be written to a scratch file",
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
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
