/**
 * SQLWeave Error Hierarchy
 *
 * All errors extend SqlWeaveError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * Compilation errors (`QueryTypeError`, `QueryValueError`) are raised before
 * any SQL is built. `CardinalityError` is only raised by the executor.
 *
 * @example
 * ```typescript
 * try {
 *   fns.sum(names);
 * } catch (error) {
 *   if (isSqlWeaveError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: A result did not have the shape the query promised.
 * - `system`: Internal error or infrastructure issue. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

/**
 * Options for SqlWeaveError constructor.
 */
export type SqlWeaveErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string | undefined;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all SQLWeave errors.
 */
export class SqlWeaveError extends Error {
  /** Machine-readable error code (e.g., "TYPE_ERROR") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: SqlWeaveErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "SqlWeaveError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Compilation Errors (category: "user")
// ============================================================

/**
 * Thrown when an argument has the wrong element kind or shape.
 *
 * @example
 * ```typescript
 * fns.sum(qb.listOf(["a", "b"]));
 * // QueryTypeError: sum expects numeric elements
 * ```
 */
export class QueryTypeError extends SqlWeaveError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "TYPE_ERROR", {
      details,
      category: "user",
      suggestion: options?.suggestion,
      cause: options?.cause,
    });
    this.name = "QueryTypeError";
  }
}

/**
 * Thrown when a numeric parameter is out of range.
 * `details.constraint` names the constraint that failed.
 */
export class QueryValueError extends SqlWeaveError {
  declare readonly details: Readonly<{
    constraint: string;
    value: unknown;
  }>;

  constructor(
    message: string,
    details: Readonly<{ constraint: string; value: unknown }>,
    options?: { cause?: unknown },
  ) {
    super(message, "VALUE_ERROR", {
      details,
      category: "user",
      cause: options?.cause,
    });
    this.name = "QueryValueError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when the runtime configuration is invalid.
 *
 * This includes unknown dialect identifiers and malformed environment
 * values. The process cannot compile queries until it is fixed.
 */
export class ConfigurationError extends SqlWeaveError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Set SQLWEAVE_DB_TYPE to one of: postgres, sqlite, duck, mysql.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Result Errors (category: "constraint")
// ============================================================

/**
 * Thrown by the executor when a single-row extraction sees zero rows
 * (for `one`) or more than one row.
 */
export class CardinalityError extends SqlWeaveError {
  declare readonly details: Readonly<{
    expected: "one" | "one_or_none";
    actual: number;
  }>;

  constructor(
    details: Readonly<{ expected: "one" | "one_or_none"; actual: number }>,
    options?: { cause?: unknown },
  ) {
    const expectation =
      details.expected === "one" ? "exactly one row" : "at most one row";
    super(
      `Expected ${expectation}, but the query returned ${details.actual}`,
      "CARDINALITY_ERROR",
      {
        details,
        category: "constraint",
        suggestion:
          details.expected === "one" && details.actual === 0 ?
            `Use firstOrNull() if an empty result is acceptable.`
          : undefined,
        cause: options?.cause,
      },
    );
    this.name = "CardinalityError";
  }
}

// ============================================================
// Database Errors (category: "system")
// ============================================================

/**
 * Thrown when the driver fails while running a statement.
 */
export class DatabaseOperationError extends SqlWeaveError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; operationId: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "DATABASE_OPERATION_ERROR", {
      details,
      category: "system",
      suggestion: `Check the database connection and the generated SQL. If the problem persists, investigate the underlying cause.`,
      cause: options?.cause,
    });
    this.name = "DatabaseOperationError";
  }
}

// ============================================================
// Compiler Errors (category: "system")
// ============================================================

/**
 * Thrown when a function exists only for some dialects and the active
 * dialect is not one of them.
 */
export class UnsupportedOperationError extends SqlWeaveError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "UNSUPPORTED_OPERATION", {
      details,
      category: "system",
      suggestion:
        options?.suggestion ??
        `This function is not available for your database dialect.`,
      cause: options?.cause,
    });
    this.name = "UnsupportedOperationError";
  }
}

/**
 * Thrown when a compiler invariant is violated.
 *
 * This indicates a bug in the compiler: it reached a state that should be
 * unreachable. These errors are not user-recoverable.
 */
export class CompilerInvariantError extends SqlWeaveError {
  constructor(
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: { cause?: unknown },
  ) {
    super(message, "COMPILER_INVARIANT_ERROR", {
      details: details ?? {},
      category: "system",
      suggestion: `This is an internal compiler error. Please report it as a bug with the call that triggered it.`,
      cause: options?.cause,
    });
    this.name = "CompilerInvariantError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for SqlWeaveError.
 */
export function isSqlWeaveError(error: unknown): error is SqlWeaveError {
  return error instanceof SqlWeaveError;
}

/**
 * Check if error is recoverable by user action (user or constraint error).
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isSqlWeaveError(error)) return false;
  return error.category === "user" || error.category === "constraint";
}

/**
 * Check if error indicates a system/infrastructure issue.
 */
export function isSystemError(error: unknown): boolean {
  return isSqlWeaveError(error) && error.category === "system";
}

/**
 * Check if error is a result-shape violation.
 */
export function isConstraintError(error: unknown): boolean {
  return isSqlWeaveError(error) && error.category === "constraint";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isSqlWeaveError(error) ? error.suggestion : undefined;
}
