/**
 * @linewise/errors
 *
 * Shared error taxonomy for the linewise completer packages.
 *
 * The error system is built on 5 behavioral base types:
 * ValidationError, NotFoundError, TimeoutError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isLinewiseError, LinewiseError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError } from "./bases/external-error.js";
export { InternalError } from "./bases/internal-error.js";
export { NotFoundError } from "./bases/not-found-error.js";
export { TimeoutError } from "./bases/timeout-error.js";
export { ValidationError } from "./bases/validation-error.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ExternalCodes,
  InternalCodes,
  LinewiseErrorOptions,
  NotFoundCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isInternalError,
  isLivenessError,
  isNotFoundError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@linewise/errors";
export const PACKAGE_VERSION = "0.1.0";
