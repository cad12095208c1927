/**
 * SQL Dialect Module
 *
 * Provides dialect adapters for different SQL databases.
 * Use `resolveDialect()` once at startup to turn a configuration value into
 * an adapter.
 */

export { DEFAULT_OPERATIONS, defineDialect } from "./common";
export { duckdbDialect } from "./duckdb";
export { mysqlDialect } from "./mysql";
export { postgresDialect } from "./postgres";
export { sqliteDialect } from "./sqlite";
export type {
  DatePart,
  DialectAdapter,
  DialectCapabilities,
  DialectFamily,
  DialectOperations,
  LiteralValue,
  SqlDialect,
} from "./types";

import { ConfigurationError } from "../../errors";
import { duckdbDialect } from "./duckdb";
import { mysqlDialect } from "./mysql";
import { postgresDialect } from "./postgres";
import { sqliteDialect } from "./sqlite";
import { type DialectAdapter, type SqlDialect } from "./types";

/**
 * Every recognized dialect identifier.
 */
export const SQL_DIALECTS = [
  "postgres",
  "sqlite",
  "duck",
  "mysql",
] as const satisfies readonly SqlDialect[];

/**
 * Map of dialect names to their adapters.
 */
const DIALECT_ADAPTERS: Readonly<Record<SqlDialect, DialectAdapter>> = {
  postgres: postgresDialect,
  sqlite: sqliteDialect,
  duck: duckdbDialect,
  mysql: mysqlDialect,
};

/**
 * Default dialect used when none is configured.
 */
export const DEFAULT_DIALECT: SqlDialect = "sqlite";

export function isSqlDialect(value: string): value is SqlDialect {
  return SQL_DIALECTS.some((dialect) => dialect === value);
}

/**
 * Gets the dialect adapter for a given dialect name.
 *
 * @example
 * ```typescript
 * const adapter = getDialect("postgres");
 * const position = adapter.strIndex(sql`'b'`, sql`'abc'`);
 * ```
 */
export function getDialect(dialect: SqlDialect): DialectAdapter {
  return DIALECT_ADAPTERS[dialect];
}

/**
 * Resolves an untrusted configuration value to a dialect adapter.
 *
 * @throws ConfigurationError if the identifier is not recognized
 */
export function resolveDialect(id: string): DialectAdapter {
  const normalized = id.trim().toLowerCase();
  if (!isSqlDialect(normalized)) {
    throw new ConfigurationError(`Unknown database type "${id}"`, {
      dbType: id,
      supported: SQL_DIALECTS,
    });
  }
  return getDialect(normalized);
}
