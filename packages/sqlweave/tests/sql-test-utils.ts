/**
 * Shared SQL test utilities.
 *
 * Renders drizzle `SQL` with drizzle's own compilers, so assertions see
 * the text and parameters the driver would receive.
 */
import { type SQL } from "drizzle-orm";
import { MySqlDialect } from "drizzle-orm/mysql-core";
import { PgDialect } from "drizzle-orm/pg-core";
import { SQLiteSyncDialect } from "drizzle-orm/sqlite-core";

import { type SqlDialect } from "../src/query/dialect";

type SqlCompiler = Readonly<{
  sqlToQuery: (query: SQL) => { sql: string; params: unknown[] };
}>;

const sqliteCompiler = new SQLiteSyncDialect();

const COMPILERS: Readonly<Record<SqlDialect, SqlCompiler>> = {
  postgres: new PgDialect(),
  sqlite: sqliteCompiler,
  // DuckDB takes `?` placeholders like SQLite
  duck: sqliteCompiler,
  mysql: new MySqlDialect(),
};

/**
 * Extracts the SQL text and parameter values. PostgreSQL placeholders are
 * `$1, $2, ...`; the others use `?`.
 */
export function toSqlWithParams(
  query: SQL,
  dialect: SqlDialect = "sqlite",
): { sql: string; params: unknown[] } {
  const { sql, params } = COMPILERS[dialect].sqlToQuery(query);
  return { sql, params };
}

export function toSqlString(query: SQL, dialect: SqlDialect = "sqlite"): string {
  return toSqlWithParams(query, dialect).sql;
}
