/**
 * Unit tests for SQLWeave error classes.
 */
import { describe, expect, it } from "vitest";

import {
  CardinalityError,
  CompilerInvariantError,
  ConfigurationError,
  DatabaseOperationError,
  getErrorSuggestion,
  isConstraintError,
  isSqlWeaveError,
  isSystemError,
  isUserRecoverable,
  QueryTypeError,
  QueryValueError,
  SqlWeaveError,
  UnsupportedOperationError,
} from "../src/errors";

describe("SqlWeaveError", () => {
  it("creates error with message, code, and options", () => {
    const error = new SqlWeaveError("test message", "TEST_CODE", {
      category: "user",
    });
    expect(error.message).toBe("test message");
    expect(error.code).toBe("TEST_CODE");
    expect(error.name).toBe("SqlWeaveError");
    expect(error.category).toBe("user");
  });

  it("stores details object", () => {
    const details = { foo: "bar", count: 42 };
    const error = new SqlWeaveError("test", "CODE", {
      category: "system",
      details,
    });
    expect(error.details).toEqual(details);
    expect(Object.isFrozen(error.details)).toBe(true);
  });

  it("defaults to empty details", () => {
    const error = new SqlWeaveError("test", "CODE", { category: "user" });
    expect(error.details).toEqual({});
  });

  it("supports error cause chain", () => {
    const cause = new Error("root cause");
    const error = new SqlWeaveError("wrapper", "CODE", {
      category: "system",
      cause,
    });
    expect(error.cause).toBe(cause);
  });

  it("formats user message with suggestion", () => {
    const error = new SqlWeaveError("something went wrong", "CODE", {
      category: "user",
      suggestion: "try again later",
    });
    expect(error.toUserMessage()).toBe(
      "something went wrong\n\nSuggestion: try again later",
    );
  });

  it("formats user message without suggestion", () => {
    const error = new SqlWeaveError("something went wrong", "CODE", {
      category: "user",
    });
    expect(error.toUserMessage()).toBe("something went wrong");
  });

  it("formats log string", () => {
    const error = new SqlWeaveError("something went wrong", "TEST_CODE", {
      category: "user",
      details: { key: "value" },
      suggestion: "fix it",
    });
    expect(error.toLogString()).toBe(
      [
        "[TEST_CODE] something went wrong",
        "  Category: user",
        "  Suggestion: fix it",
        '  Details: {"key":"value"}',
      ].join("\n"),
    );
  });

  it("includes a string cause in the log string", () => {
    const error = new SqlWeaveError("failed", "CODE", {
      category: "system",
      cause: "disk full",
    });
    expect(error.toLogString()).toBe(
      "[CODE] failed\n  Category: system\n  Cause: disk full",
    );
  });
});

describe("QueryTypeError", () => {
  it("creates error with TYPE_ERROR code", () => {
    const error = new QueryTypeError("sum expects numeric elements", {
      function: "sum",
    });
    expect(error.code).toBe("TYPE_ERROR");
    expect(error.name).toBe("QueryTypeError");
    expect(error.category).toBe("user");
    expect(error.details).toEqual({ function: "sum" });
  });
});

describe("QueryValueError", () => {
  it("stores the failed constraint", () => {
    const error = new QueryValueError("n must be a positive integer", {
      constraint: "n >= 1",
      value: 0,
    });
    expect(error.code).toBe("VALUE_ERROR");
    expect(error.details.constraint).toBe("n >= 1");
    expect(error.details.value).toBe(0);
  });
});

describe("ConfigurationError", () => {
  it("creates error with CONFIGURATION_ERROR code", () => {
    const error = new ConfigurationError("bad config", { dbType: "oracle" });
    expect(error.code).toBe("CONFIGURATION_ERROR");
    expect(error.category).toBe("user");
    expect(error.details).toEqual({ dbType: "oracle" });
  });

  it("suggests the supported dialects by default", () => {
    const error = new ConfigurationError("bad config");
    expect(error.suggestion).toBe(
      "Set SQLWEAVE_DB_TYPE to one of: postgres, sqlite, duck, mysql.",
    );
  });

  it("accepts a custom suggestion", () => {
    const error = new ConfigurationError("bad", {}, { suggestion: "do this" });
    expect(error.suggestion).toBe("do this");
  });
});

describe("CardinalityError", () => {
  it("reports a missing row for a one extraction", () => {
    const error = new CardinalityError({ expected: "one", actual: 0 });
    expect(error.message).toBe(
      "Expected exactly one row, but the query returned 0",
    );
    expect(error.code).toBe("CARDINALITY_ERROR");
    expect(error.category).toBe("constraint");
    expect(error.suggestion).toBe(
      "Use firstOrNull() if an empty result is acceptable.",
    );
  });

  it("reports extra rows for a one_or_none extraction", () => {
    const error = new CardinalityError({ expected: "one_or_none", actual: 2 });
    expect(error.message).toBe(
      "Expected at most one row, but the query returned 2",
    );
    expect(error.suggestion).toBeUndefined();
    expect(error.details).toEqual({ expected: "one_or_none", actual: 2 });
  });
});

describe("DatabaseOperationError", () => {
  it("keeps the driver error as cause", () => {
    const cause = new Error("no such table: missing");
    const error = new DatabaseOperationError(
      "eval failed: no such table: missing",
      { operation: "eval", operationId: "op-1" },
      { cause },
    );
    expect(error.cause).toBe(cause);
    expect(error.category).toBe("system");
    expect(error.details).toEqual({ operation: "eval", operationId: "op-1" });
  });
});

describe("error helpers", () => {
  const typeError = new QueryTypeError("wrong");
  const cardinalityError = new CardinalityError({ expected: "one", actual: 0 });
  const unsupportedError = new UnsupportedOperationError("nope");
  const invariantError = new CompilerInvariantError("bug");

  it("identifies SQLWeave errors", () => {
    expect(isSqlWeaveError(typeError)).toBe(true);
    expect(isSqlWeaveError(new Error("plain"))).toBe(false);
    expect(isSqlWeaveError("string")).toBe(false);
  });

  it("classifies user-recoverable errors", () => {
    expect(isUserRecoverable(typeError)).toBe(true);
    expect(isUserRecoverable(cardinalityError)).toBe(true);
    expect(isUserRecoverable(unsupportedError)).toBe(false);
    expect(isUserRecoverable(new Error("plain"))).toBe(false);
  });

  it("classifies system errors", () => {
    expect(isSystemError(unsupportedError)).toBe(true);
    expect(isSystemError(invariantError)).toBe(true);
    expect(isSystemError(typeError)).toBe(false);
  });

  it("classifies constraint errors", () => {
    expect(isConstraintError(cardinalityError)).toBe(true);
    expect(isConstraintError(typeError)).toBe(false);
  });

  it("extracts suggestions", () => {
    expect(getErrorSuggestion(unsupportedError)).toBe(
      "This function is not available for your database dialect.",
    );
    expect(getErrorSuggestion(new Error("plain"))).toBeUndefined();
  });

  it("keeps every error an Error", () => {
    for (const error of [
      typeError,
      cardinalityError,
      unsupportedError,
      invariantError,
    ]) {
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(SqlWeaveError);
    }
  });
});
