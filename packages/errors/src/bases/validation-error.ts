import { LinewiseError } from "../base.js";
import type { LinewiseErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

/**
 * Errors caused by invalid input, configuration, or request data.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCodes = ValidationCodes> extends LinewiseError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;

  /** Structured validation issues (populated from schema failures) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: LinewiseErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
    super(
      options.code,
      options.message,
      options.metadata,
      options.traceId,
      options.cause ? { cause: options.cause } : undefined,
    );
    this.code = options.code;
    this.issues = options.issues ?? [];
  }
}
