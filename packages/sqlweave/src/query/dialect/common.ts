/**
 * Shared dialect defaults.
 *
 * Dialect modules override only what differs; everything else resolves
 * here. Defaults that build on other primitives call them through `this`,
 * so an override of `castInt` also changes `countTrue`.
 */
import { type SQL, sql } from "drizzle-orm";

import { type FlatColumn, type PrimitiveType } from "../../core/types";
import {
  type DialectAdapter,
  type DialectCapabilities,
  type DialectFamily,
  type DialectOperations,
  type LiteralValue,
  type SqlDialect,
} from "./types";

const DEFAULT_SQL_TYPES: Readonly<Record<PrimitiveType["name"], string>> = {
  int: "INTEGER",
  float: "FLOAT",
  string: "TEXT",
  bool: "BOOLEAN",
  datetime: "TIMESTAMP",
  null: "TEXT",
};

/**
 * Double-quote identifier quoting shared by PostgreSQL, SQLite and DuckDB.
 */
export function quoteWithDoubleQuotes(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

/**
 * `"a" INTEGER, "b" TEXT` for a temporary table definition.
 */
export function columnDefinitions(
  dialect: Pick<DialectOperations, "quoteIdentifier" | "sqlType">,
  columns: readonly FlatColumn[],
): string {
  return columns
    .map(
      (column) =>
        `${dialect.quoteIdentifier(column.name)} ${dialect.sqlType(column.type)}`,
    )
    .join(", ");
}

export const DEFAULT_OPERATIONS: DialectOperations = {
  // ============================================================
  // Identifiers & Literals
  // ============================================================

  quoteIdentifier(name) {
    return quoteWithDoubleQuotes(name);
  },

  bindValue(value: LiteralValue) {
    if (value instanceof Date) {
      return value.toISOString();
    }
    return value;
  },

  literal(value) {
    if (value === null) {
      return sql.raw("NULL");
    }
    return sql`${this.bindValue(value)}`;
  },

  sqlType(type) {
    return DEFAULT_SQL_TYPES[type.name];
  },

  createTempTable(name, columns) {
    return sql.raw(
      `CREATE TEMPORARY TABLE ${this.quoteIdentifier(name)} (${columnDefinitions(this, columns)})`,
    );
  },

  // ============================================================
  // Numbers
  // ============================================================

  random() {
    return sql`RANDOM()`;
  },

  pi() {
    return sql`PI()`;
  },

  castInt(value) {
    return sql`CAST(${value} AS INT)`;
  },

  castFloat(value) {
    return sql`CAST(${value} AS FLOAT)`;
  },

  castString(value) {
    return sql`CAST(${value} AS VARCHAR)`;
  },

  castAs(value, type) {
    return sql`CAST(${value} AS ${sql.raw(this.sqlType(type))})`;
  },

  intDiv(dividend, divisor) {
    return sql`(${dividend} / ${divisor})`;
  },

  round(value, digits) {
    return sql`ROUND(${value}, ${digits})`;
  },

  // ============================================================
  // Strings
  // ============================================================

  strIndex(needle, haystack) {
    return sql`(INSTR(${haystack}, ${needle}) - 1)`;
  },

  char(code) {
    return sql`CHR(${code})`;
  },

  charOrd(value) {
    return sql`ASCII(${value})`;
  },

  repeat(value, times) {
    return sql`REPEAT(${value}, ${times})`;
  },

  length(value) {
    return sql`LENGTH(${value})`;
  },

  upper(value) {
    return sql`UPPER(${value})`;
  },

  lower(value) {
    return sql`LOWER(${value})`;
  },

  // ============================================================
  // Time
  // ============================================================

  now() {
    return sql`NOW()`;
  },

  // ============================================================
  // Aggregates
  // ============================================================

  firstInGroup(value) {
    return sql`(ARRAY_AGG(${value}))[1]`;
  },

  countTrue(value) {
    return sql`SUM(${this.castInt(value)})`;
  },

  countFalse(value) {
    return sql`SUM(${this.castInt(sql`NOT (${value})`)})`;
  },
};

/**
 * Builds a frozen adapter from the shared defaults plus overrides.
 */
export function defineDialect(
  identity: Readonly<{
    name: SqlDialect;
    family: DialectFamily;
    capabilities: DialectCapabilities;
  }>,
  overrides: Partial<DialectOperations> & ThisType<DialectAdapter>,
): DialectAdapter {
  return Object.freeze({
    ...DEFAULT_OPERATIONS,
    ...overrides,
    ...identity,
  });
}

/**
 * Joins SQL fragments with commas.
 */
export function commaList(parts: readonly SQL[]): SQL {
  return sql.join([...parts], sql`, `);
}
