import { LinewiseError } from "../base.js";
import type { LinewiseErrorOptions, TimeoutCodes } from "../types.js";

/**
 * Errors when an operation exceeded its deadline.
 */
export class TimeoutError<C extends TimeoutCodes = TimeoutCodes> extends LinewiseError {
  readonly _tag = "TimeoutError" as const;
  override readonly code: C;
  /** Deadline that elapsed, in milliseconds */
  readonly timeoutMs: number;

  constructor(options: LinewiseErrorOptions<C> & { timeoutMs: number }) {
    super(
      options.code,
      options.message,
      { ...options.metadata, timeoutMs: String(options.timeoutMs) },
      options.traceId,
      options.cause ? { cause: options.cause } : undefined,
    );
    this.code = options.code;
    this.timeoutMs = options.timeoutMs;
  }
}
