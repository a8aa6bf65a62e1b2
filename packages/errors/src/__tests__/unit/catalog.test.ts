import { describe, expect, it } from "vitest";
import {
  ERROR_CATALOG,
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  InternalError,
  isValidErrorCode,
  NotFoundError,
  validateCatalog,
  wrapError,
} from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should have all expected domains", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    expect([...domains].sort()).toEqual(["completer", "config", "helper", "internal"]);
  });

  it("should have valid HTTP status codes for all entries", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.httpStatus).toBeGreaterThanOrEqual(100);
      expect(entry.httpStatus).toBeLessThan(600);
    }
  });

  it("passes its own consistency check", () => {
    expect(validateCatalog()).toEqual({ valid: true, errors: [] });
  });
});

describe("catalog utilities", () => {
  it("looks up entries by code", () => {
    expect(getCatalogEntry("HELPER_RESPONSE_TIMEOUT").baseType).toBe("TimeoutError");
  });

  it("validates code strings", () => {
    expect(isValidErrorCode("HELPER_NOT_RUNNING")).toBe(true);
    expect(isValidErrorCode("NOT_A_CODE")).toBe(false);
    expect(isValidErrorCode("toString")).toBe(false);
  });

  it("lists codes by domain", () => {
    expect(getErrorCodesByDomain("helper")).toEqual([
      "HELPER_NOT_RUNNING",
      "HELPER_STREAM_CLOSED",
      "HELPER_WRITE_FAILED",
      "HELPER_RESPONSE_TIMEOUT",
    ]);
    expect(getAllErrorCodes()).toHaveLength(Object.keys(ERROR_CATALOG).length);
  });
});

describe("wrapError", () => {
  it("returns catalog errors unchanged", () => {
    const original = new NotFoundError({
      code: "COMPLETER_DEFINITION_NOT_FOUND",
      message: "nope",
    });
    expect(wrapError(original)).toBe(original);
  });

  it("wraps plain errors as InternalError", () => {
    const cause = new TypeError("boom");
    const wrapped = wrapError(cause, "trace-1");

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.traceId).toBe("trace-1");
    expect(wrapped.cause).toBe(cause);
  });

  it("wraps strings and unknown values", () => {
    expect(wrapError("text").message).toBe("text");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });
});

describe("getErrorMessage", () => {
  it("extracts messages", () => {
    expect(getErrorMessage(new Error("a"))).toBe("a");
    expect(getErrorMessage("b")).toBe("b");
    expect(getErrorMessage(null)).toBe("An unknown error occurred");
  });
});
