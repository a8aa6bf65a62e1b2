/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { LinewiseError } from "./base.js";
import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (no result) */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/** Check if an error is a TimeoutError (deadline exceeded) */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/** Check if an error is an ExternalError (helper/runtime failure) */
export function isExternalError(error: unknown): error is ExternalError {
  return error instanceof ExternalError;
}

/** Check if an error is an InternalError (bug) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a LinewiseError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: LinewiseError,
  code: C,
): error is LinewiseError & { readonly code: C } {
  return error.code === code;
}

const LIVENESS_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "HELPER_NOT_RUNNING",
  "HELPER_STREAM_CLOSED",
  "HELPER_WRITE_FAILED",
]);

/**
 * Check if an error means the helper process is gone: not running,
 * output closed mid-response, or its input pipe broken.
 */
export function isLivenessError(error: unknown): error is ExternalError {
  return error instanceof ExternalError && LIVENESS_CODES.has(error.code);
}

/**
 * Check if an error represents an expected condition.
 * Returns false for non-LinewiseError values.
 */
export function isExpectedError(error: unknown): boolean {
  if (
    error !== null &&
    error !== undefined &&
    typeof error === "object" &&
    "isExpected" in error &&
    typeof error.isExpected === "boolean"
  ) {
    return error.isExpected;
  }
  return false;
}
