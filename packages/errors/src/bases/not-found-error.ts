import { LinewiseError } from "../base.js";
import type { LinewiseErrorOptions, NotFoundCodes } from "../types.js";

/**
 * Errors when a requested result does not exist.
 * The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCodes = NotFoundCodes> extends LinewiseError {
  readonly _tag = "NotFoundError" as const;
  override readonly code: C;

  constructor(options: LinewiseErrorOptions<C>) {
    super(
      options.code,
      options.message,
      options.metadata,
      options.traceId,
      options.cause ? { cause: options.cause } : undefined,
    );
    this.code = options.code;
  }
}
