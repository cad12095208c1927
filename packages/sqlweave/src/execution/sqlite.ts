/**
 * better-sqlite3 runner.
 *
 * @example In-memory database (default)
 * ```typescript
 * import { createLocalSqliteExecutor } from "sqlweave/sqlite";
 *
 * const { executor, close } = createLocalSqliteExecutor();
 * const total = await executor.forceEval(fns.sum(qb.listOf([1, 2, 3])));
 * await close();
 * ```
 *
 * @example Existing drizzle database
 * ```typescript
 * import Database from "better-sqlite3";
 * import { drizzle } from "drizzle-orm/better-sqlite3";
 *
 * const db = drizzle(new Database("app.db"));
 * const executor = createSqliteExecutor(db);
 * ```
 */
import Database from "better-sqlite3";
import { type SQL } from "drizzle-orm";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import { SQLiteSyncDialect } from "drizzle-orm/sqlite-core";

import { ConfigurationError } from "../errors";
import { sqliteDialect } from "../query/dialect";
import { Executor } from "./executor";
import {
  type CompiledSqlQuery,
  type ExecutorHooks,
  type Row,
  type SqlExecutionAdapter,
} from "./types";

type NodeModuleVersionMismatch = Readonly<{
  compiled: number;
  required: number;
}>;

function getUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function parseNodeModuleVersionMismatchMessage(
  message: string,
): NodeModuleVersionMismatch | undefined {
  const regexp =
    /NODE_MODULE_VERSION (?<compiled>\d+)[\s\S]*?NODE_MODULE_VERSION (?<required>\d+)/;
  const match = regexp.exec(message);
  if (!match?.groups) return undefined;

  const compiled = Number(match.groups.compiled);
  const required = Number(match.groups.required);

  if (!Number.isFinite(compiled) || !Number.isFinite(required))
    return undefined;

  return { compiled, required };
}

function createDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    const message = getUnknownErrorMessage(error);
    const mismatch = parseNodeModuleVersionMismatchMessage(message);
    if (!mismatch) throw error;

    throw new ConfigurationError(
      [
        "Failed to load better-sqlite3 native addon.",
        `It was compiled for NODE_MODULE_VERSION ${mismatch.compiled}, but this Node.js runtime requires ${mismatch.required}.`,
        "Rebuild with: npm rebuild better-sqlite3.",
      ].join(" "),
      {
        nodeVersion: process.version,
        nodeModuleVersion: process.versions.modules,
        compiledNodeModuleVersion: mismatch.compiled,
        requiredNodeModuleVersion: mismatch.required,
      },
      { cause: error, suggestion: "Rebuild native dependencies for the active Node.js version." },
    );
  }
}

// ============================================================
// Adapter
// ============================================================

const compiler = new SQLiteSyncDialect();

export function createSqliteExecutionAdapter(
  db: BetterSQLite3Database,
): SqlExecutionAdapter {
  const compile = (query: SQL): CompiledSqlQuery => compiler.sqlToQuery(query);

  return {
    compile,
    execute(query: SQL): Promise<readonly Row[]> {
      return Promise.resolve(db.all<Row>(query));
    },
    run(query: SQL): Promise<void> {
      db.run(query);
      return Promise.resolve();
    },
  };
}

export type SqliteExecutorOptions = Readonly<{
  hooks?: ExecutorHooks;
}>;

export function createSqliteExecutor(
  db: BetterSQLite3Database,
  options: SqliteExecutorOptions = {},
): Executor {
  return new Executor({
    dialect: sqliteDialect,
    adapter: createSqliteExecutionAdapter(db),
    ...(options.hooks === undefined ? {} : { hooks: options.hooks }),
  });
}

// ============================================================
// Local Factory
// ============================================================

export type LocalSqliteExecutorOptions = Readonly<{
  /**
   * Path to the SQLite database file.
   * Defaults to ":memory:" for an in-memory database.
   */
  path?: string;
  hooks?: ExecutorHooks;
}>;

export type LocalSqliteExecutorResult = Readonly<{
  executor: Executor;
  /** The underlying drizzle database, for seeding tables */
  db: BetterSQLite3Database;
  /** Drops materialized tables and closes the database; idempotent */
  close: () => Promise<void>;
}>;

/**
 * Opens a SQLite database and binds an executor to it.
 */
export function createLocalSqliteExecutor(
  options: LocalSqliteExecutorOptions = {},
): LocalSqliteExecutorResult {
  const sqlite = createDatabase(options.path ?? ":memory:");
  const db = drizzle(sqlite);
  const executor = new Executor({
    dialect: sqliteDialect,
    adapter: {
      ...createSqliteExecutionAdapter(db),
      close: () => {
        sqlite.close();
        return Promise.resolve();
      },
    },
    ...(options.hooks === undefined ? {} : { hooks: options.hooks }),
  });

  return { executor, db, close: () => executor.close() };
}
