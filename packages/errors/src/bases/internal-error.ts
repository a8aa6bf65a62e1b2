import { LinewiseError } from "../base.js";
import type { InternalCodes, LinewiseErrorOptions } from "../types.js";

/**
 * Errors caused by bugs or unexpected states.
 */
export class InternalError extends LinewiseError {
  readonly _tag = "InternalError" as const;
  override readonly code: InternalCodes;

  constructor(options: LinewiseErrorOptions<InternalCodes>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | LinewiseErrorOptions<InternalCodes>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: LinewiseErrorOptions<InternalCodes> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR", message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(
      opts.code,
      opts.message,
      opts.metadata,
      opts.traceId,
      opts.cause ? { cause: opts.cause } : undefined,
    );
    this.code = opts.code;
  }
}
