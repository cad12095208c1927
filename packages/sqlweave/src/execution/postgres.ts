/**
 * node-postgres runner.
 *
 * Temporary tables live on one connection, so `materialize` and
 * `sampleFast` need the executor bound to a single `pg.Client` (or a pool
 * of size one). A pool hands consecutive statements to different
 * connections.
 *
 * @example
 * ```typescript
 * import { Client } from "pg";
 *
 * const client = new Client({ connectionString: process.env.DATABASE_URL });
 * await client.connect();
 * const executor = createPostgresClientExecutor(client);
 * ```
 */
import { type SQL } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { PgDialect } from "drizzle-orm/pg-core";
import { type Client } from "pg";

import { postgresDialect } from "../query/dialect";
import { Executor } from "./executor";
import {
  type CompiledSqlQuery,
  type ExecutorHooks,
  type Row,
  type SqlExecutionAdapter,
} from "./types";

const compiler = new PgDialect();

export function createPostgresExecutionAdapter(
  db: NodePgDatabase,
): SqlExecutionAdapter {
  function compile(query: SQL): CompiledSqlQuery {
    return compiler.sqlToQuery(query);
  }

  return {
    compile,
    async execute(query: SQL): Promise<readonly Row[]> {
      const result = await db.execute(query);
      return result.rows;
    },
    async run(query: SQL): Promise<void> {
      await db.execute(query);
    },
  };
}

export type PostgresExecutorOptions = Readonly<{
  hooks?: ExecutorHooks;
}>;

export function createPostgresExecutor(
  db: NodePgDatabase,
  options: PostgresExecutorOptions = {},
): Executor {
  return new Executor({
    dialect: postgresDialect,
    adapter: createPostgresExecutionAdapter(db),
    ...(options.hooks === undefined ? {} : { hooks: options.hooks }),
  });
}

/**
 * Binds an executor to one connected client. `close()` on the executor
 * ends the client.
 */
export function createPostgresClientExecutor(
  client: Client,
  options: PostgresExecutorOptions = {},
): Executor {
  const adapter = createPostgresExecutionAdapter(drizzle(client));
  return new Executor({
    dialect: postgresDialect,
    adapter: {
      ...adapter,
      close: () => client.end(),
    },
    ...(options.hooks === undefined ? {} : { hooks: options.hooks }),
  });
}
