import { describe, expect, it } from "vitest";
import {
  ERROR_CATALOG,
  ExternalError,
  getErrorMessage,
  LoadTraceError,
  NotFoundError,
  toError,
  ValidationError,
} from "../../index.js";

describe("LoadTraceError base class", () => {
  it("should create error with correct properties", () => {
    const error = new NotFoundError({
      code: "LOAD_TRACE_SCOPE_MISSING",
      message: "Test error",
    });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(LoadTraceError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("NotFoundError");
    expect(error._tag).toBe("NotFoundError");
    expect(error.code).toBe("LOAD_TRACE_SCOPE_MISSING");
    expect(error.domain).toBe("loadtrace");
    expect(error.isExpected).toBe(true);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should preserve stack traces", () => {
    const error = new NotFoundError({ code: "LOAD_TRACE_SCOPE_MISSING", message: "Stack test" });
    expect(error.stack).toContain("NotFoundError");
  });

  it("should serialize to JSON", () => {
    const error = new ExternalError({
      code: "LOAD_TRACE_REPORT_FAILED",
      message: "JSON test",
      metadata: { key: "value" },
      traceId: "trace-123",
    });

    expect(error.toJSON()).toEqual({
      _tag: "ExternalError",
      name: "ExternalError",
      code: "LOAD_TRACE_REPORT_FAILED",
      message: "JSON test",
      domain: "loadtrace",
      isExpected: false,
      metadata: { key: "value" },
      traceId: "trace-123",
      timestamp: error.timestamp.toISOString(),
    });
  });

  it("should omit metadata and traceId from JSON when absent", () => {
    const json = new NotFoundError({ code: "LOAD_TRACE_SCOPE_MISSING", message: "gone" }).toJSON();

    expect("metadata" in json).toBe(false);
    expect("traceId" in json).toBe(false);
  });

  it("should carry the cause", () => {
    const cause = new Error("disk full");
    const error = new ExternalError({
      code: "LOAD_TRACE_REPORT_FAILED",
      message: "sink failed",
      cause,
    });

    expect(error.cause).toBe(cause);
  });
});

describe("ValidationError", () => {
  it("should default to empty issues", () => {
    const error = new ValidationError({
      code: "LOAD_TRACE_CONFIGURATION_INVALID",
      message: "bad input",
    });

    expect(error.isExpected).toBe(true);
    expect(error.issues).toEqual([]);
  });
});

describe("ERROR_CATALOG", () => {
  it("maps every code to the loadtrace domain", () => {
    expect(Object.keys(ERROR_CATALOG)).toEqual([
      "LOAD_TRACE_CONFIGURATION_INVALID",
      "LOAD_TRACE_REPORT_FAILED",
      "LOAD_TRACE_SCOPE_MISSING",
    ]);
    expect(Object.values(ERROR_CATALOG).every((entry) => entry.domain === "loadtrace")).toBe(true);
  });
});

describe("getErrorMessage / toError", () => {
  it("extracts messages", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("boom")).toBe("boom");
    expect(getErrorMessage(null)).toBe("An unknown error occurred");
  });

  it("coerces non-errors", () => {
    const original = new Error("kept");
    expect(toError(original)).toBe(original);
    expect(toError("text").message).toBe("text");
  });
});
