/**
 * SQL Dialect Abstraction Layer
 *
 * Provides a unified interface for dialect-specific SQL generation.
 * Every dialect starts from the shared defaults in `./common` and overrides
 * only the primitives whose syntax differs.
 */
import { type SQL } from "drizzle-orm";

import { type FlatColumn, type PrimitiveType } from "../../core/types";

/**
 * Supported SQL dialect identifiers.
 */
export type SqlDialect = "postgres" | "sqlite" | "duck" | "mysql";

/**
 * Dialect families. `sqlite` and `duck` share SQLite-like behavior.
 */
export type DialectFamily = "postgres" | "sqlite_like" | "mysql";

/**
 * Date parts exposed by dialects that support extraction.
 */
export type DatePart =
  | "year"
  | "month"
  | "day"
  | "hour"
  | "minute"
  | "day_of_week"
  | "week_of_year";

/**
 * Literal values that can be bound as query parameters.
 */
export type LiteralValue = string | number | boolean | Date | null;

/**
 * Capability profile for a SQL dialect.
 */
export type DialectCapabilities = Readonly<{
  /**
   * Whether recursive CTEs should enforce worktable-first join ordering.
   */
  forceRecursiveWorktableOuterJoinOrder: boolean;

  /**
   * Whether `FULL OUTER JOIN` is available. When false, it is emulated with
   * a LEFT JOIN and the unmatched rows of a RIGHT JOIN.
   */
  supportsFullOuterJoin: boolean;

  /**
   * Whether the non-recursive term of a recursive CTE fixes its column
   * types. When true, the base term is wrapped so its columns are cast to
   * the declared types.
   */
  typedRecursiveColumns: boolean;
}>;

/**
 * Adapter interface for SQL dialect differences.
 *
 * Each method generates dialect-specific SQL for a common operation.
 * All methods return Drizzle SQL objects that can be composed together.
 */
export type DialectAdapter = Readonly<{
  /**
   * The dialect identifier this adapter handles.
   */
  name: SqlDialect;

  family: DialectFamily;

  capabilities: DialectCapabilities;

  // ============================================================
  // Identifiers & Literals
  // ============================================================

  /**
   * Quotes an identifier with proper escaping.
   *
   * @example
   * PostgreSQL: "rank"
   * MySQL: `rank`
   */
  quoteIdentifier(name: string): string;

  /**
   * Converts a value for SQL binding.
   * SQLite doesn't support booleans directly, so they become 0/1.
   */
  bindValue(value: LiteralValue): unknown;

  /**
   * Renders a bound literal. PostgreSQL casts the parameter so untyped
   * placeholders still resolve in SELECT lists and UNIONs.
   */
  literal(value: LiteralValue, type: PrimitiveType): SQL;

  /**
   * SQL type name used in CAST expressions.
   */
  sqlType(type: PrimitiveType): string;

  /**
   * `CREATE TEMPORARY TABLE name (columns)`. Rows are inserted separately
   * so the SELECT can carry bound parameters on every backend.
   */
  createTempTable(name: string, columns: readonly FlatColumn[]): SQL;

  // ============================================================
  // Numbers
  // ============================================================

  /**
   * A uniformly distributed float in [0, 1), drawn per evaluation.
   *
   * @example
   * PostgreSQL: RANDOM()
   * MySQL: RAND()
   */
  random(): SQL;

  pi(): SQL;

  castInt(value: SQL): SQL;

  castFloat(value: SQL): SQL;

  /**
   * @example
   * PostgreSQL: CAST(x AS VARCHAR)
   * MySQL: CAST(x AS CHAR)
   */
  castString(value: SQL): SQL;

  /**
   * Casts to the column type used for `type` in tables and CTEs.
   */
  castAs(value: SQL, type: PrimitiveType): SQL;

  /**
   * Integer division, truncating toward zero for non-negative operands.
   *
   * @example
   * PostgreSQL: a / b
   * DuckDB: a // b
   * MySQL: a DIV b
   */
  intDiv(dividend: SQL, divisor: SQL): SQL;

  round(value: SQL, digits: SQL): SQL;

  // ============================================================
  // Strings
  // ============================================================

  /**
   * 0-based position of `needle` in `haystack`; negative when absent.
   *
   * @example
   * PostgreSQL: STRPOS(haystack, needle) - 1
   * MySQL: LOCATE(needle, haystack) - 1
   */
  strIndex(needle: SQL, haystack: SQL): SQL;

  char(code: SQL): SQL;

  charOrd(value: SQL): SQL;

  repeat(value: SQL, times: SQL): SQL;

  length(value: SQL): SQL;

  upper(value: SQL): SQL;

  lower(value: SQL): SQL;

  // ============================================================
  // Time
  // ============================================================

  now(): SQL;

  /**
   * Extracts a date part. Only present on dialects that expose date parts.
   */
  datePart?: (part: DatePart, value: SQL) => SQL;

  // ============================================================
  // Aggregates
  // ============================================================

  /**
   * The first value of a group, in the order rows reach the aggregate.
   */
  firstInGroup(value: SQL): SQL;

  countTrue(value: SQL): SQL;

  countFalse(value: SQL): SQL;

  /**
   * Only present on dialects that expose distinct counting.
   */
  countDistinct?: (value: SQL) => SQL;
}>;

/**
 * The overridable part of an adapter; identity fields are supplied by
 * `defineDialect`.
 */
export type DialectOperations = Omit<
  DialectAdapter,
  "name" | "family" | "capabilities"
>;
