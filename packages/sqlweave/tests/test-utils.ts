/**
 * Shared test utilities.
 *
 * Uses createLocalSqliteExecutor from the public sqlite module with an
 * in-memory database.
 */
import { sql } from "drizzle-orm";
import { type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { afterEach } from "vitest";

import { type Executor } from "../src/execution/executor";
import { createLocalSqliteExecutor } from "../src/execution/sqlite";
import { type ExecutorHooks } from "../src/execution/types";
import { createQueryFunctions, type QueryFunctions } from "../src/functions";
import { sqliteDialect } from "../src/query/dialect";

const closers: (() => Promise<void>)[] = [];

async function closeCreatedTestDatabases(): Promise<void> {
  const current = closers.splice(0);
  await Promise.all(current.map((close) => close()));
}

afterEach(closeCreatedTestDatabases);

export type TestContext = Readonly<{
  executor: Executor;
  db: BetterSQLite3Database;
  fns: QueryFunctions;
}>;

/**
 * An executor over in-memory SQLite with the function surface bound to it.
 * Closed after each test.
 */
export function createTestContext(hooks?: ExecutorHooks): TestContext {
  const { executor, db, close } = createLocalSqliteExecutor(
    hooks === undefined ? {} : { hooks },
  );
  closers.push(close);
  const fns = createQueryFunctions(sqliteDialect, { executor });
  return { executor, db, fns };
}

/**
 * Creates `edges(src INTEGER, dst INTEGER)` holding `pairs`.
 */
export function seedEdges(
  db: BetterSQLite3Database,
  pairs: readonly (readonly [number, number])[],
): void {
  db.run(sql`CREATE TABLE edges (src INTEGER NOT NULL, dst INTEGER NOT NULL)`);
  for (const [src, dst] of pairs) {
    db.run(sql`INSERT INTO edges (src, dst) VALUES (${src}, ${dst})`);
  }
}

/**
 * Creates `numbers(n INTEGER)` holding `values` in insertion order.
 */
export function seedNumbers(
  db: BetterSQLite3Database,
  values: readonly number[],
): void {
  db.run(sql`CREATE TABLE numbers (n INTEGER NOT NULL)`);
  for (const value of values) {
    db.run(sql`INSERT INTO numbers (n) VALUES (${value})`);
  }
}

/**
 * Sorts numbers ascending without mutating the input.
 */
export function sorted(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Pulls one numeric column out of result rows.
 */
export function columnValues(
  rows: readonly Readonly<Record<string, unknown>>[],
  column: string,
): number[] {
  return rows.map((row) => {
    const value = row[column];
    if (typeof value !== "number") {
      throw new TypeError(`Column ${column} is not numeric: ${String(value)}`);
    }
    return value;
  });
}
