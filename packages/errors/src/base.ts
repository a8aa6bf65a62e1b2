import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

/**
 * JSON shape produced by `LinewiseError.toJSON()`.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string>;
  traceId?: string;
  stack?: string;
}

/**
 * Root of the error hierarchy. Everything except `_tag` and `code` is
 * derived from the catalog entry for the code.
 */
export abstract class LinewiseError extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  protected constructor(
    code: ErrorCode,
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    const entry = ERROR_CATALOG[code];
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      ...(this.stack ? { stack: this.stack } : {}),
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/** Check if a value is any `LinewiseError`. */
export function isLinewiseError(error: unknown): error is LinewiseError {
  return error instanceof LinewiseError;
}
