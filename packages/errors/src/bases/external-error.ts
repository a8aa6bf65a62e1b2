import { LinewiseError } from "../base.js";
import type { ExternalCodes, LinewiseErrorOptions } from "../types.js";

/**
 * Errors caused by runtime failures in external dependencies, here the
 * helper process and its pipes. The `.code` field discriminates the
 * specific error.
 */
export class ExternalError<C extends ExternalCodes = ExternalCodes> extends LinewiseError {
  readonly _tag = "ExternalError" as const;
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
