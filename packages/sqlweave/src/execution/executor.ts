/**
 * Runs compiled expressions through a drizzle database.
 *
 * The executor is the only place where SQL meets a connection. It renders
 * an expression, runs it through the adapter, decodes driver values back
 * to the expression's declared type, and enforces the row count recorded
 * on single-row extractions.
 */
import { type SQL, sql } from "drizzle-orm";

import {
  type Expr,
  type ListExpr,
  type RelationExpr,
  type ScalarExpr,
} from "../core/expr";
import { type PrimitiveType } from "../core/types";
import {
  CardinalityError,
  CompilerInvariantError,
  DatabaseOperationError,
  QueryTypeError,
} from "../errors";
import { INTERNAL_TABLE_PREFIX, LIST_COLUMN, QueryBuilder } from "../query/builder";
import { commaList } from "../query/dialect/common";
import { type DialectAdapter } from "../query/dialect";
import {
  aliased,
  identifier,
  projectColumns,
  relationColumns,
  subquerySource,
} from "../query/sql-utils";
import { generateId, generateTableId } from "../utils";
import {
  type ExecutorHooks,
  type ExecutorOperation,
  type QueryHookContext,
  type ResultRow,
  type ResultValue,
  type Row,
  type SqlExecutionAdapter,
} from "./types";

/**
 * What `forceEval` returns: a value for a scalar, rows for a relation, and
 * one result per item for a list.
 */
export type EvalResult =
  | ResultValue
  | readonly ResultRow[]
  | readonly EvalResult[];

export type ExecutorOptions = Readonly<{
  dialect: DialectAdapter;
  adapter: SqlExecutionAdapter;
  hooks?: ExecutorHooks;
}>;

type QueryOutcome = Readonly<{
  rows: readonly Row[];
  context: QueryHookContext;
}>;

// ============================================================
// Decoding
// ============================================================

/**
 * Converts a driver value to the declared primitive type. Postgres returns
 * BIGINT and NUMERIC as strings and SQLite returns booleans as 0/1.
 *
 * @throws CompilerInvariantError when an int does not fit in a JavaScript
 * number without losing precision
 */
export function decodeValue(type: PrimitiveType, raw: unknown): ResultValue {
  if (raw === null || raw === undefined) return null;

  switch (type.name) {
    case "int": {
      if (
        typeof raw === "number" ||
        typeof raw === "string" ||
        typeof raw === "bigint"
      ) {
        const value = Number(raw);
        if (Math.abs(value) > Number.MAX_SAFE_INTEGER) {
          throw new CompilerInvariantError(
            `Integer ${String(raw)} is outside the safe JavaScript range`,
            { type: type.name, value: String(raw) },
          );
        }
        return value;
      }
      break;
    }
    case "float": {
      if (typeof raw === "number") return raw;
      if (typeof raw === "string" || typeof raw === "bigint") {
        return Number(raw);
      }
      break;
    }
    case "bool": {
      if (typeof raw === "boolean") return raw;
      if (typeof raw === "number" || typeof raw === "bigint") {
        return Number(raw) !== 0;
      }
      if (typeof raw === "string") {
        return raw === "1" || raw === "t" || raw === "true";
      }
      break;
    }
    case "string": {
      if (typeof raw === "string") return raw;
      if (typeof raw === "number" || typeof raw === "boolean") {
        return String(raw);
      }
      break;
    }
    case "datetime": {
      if (raw instanceof Date || typeof raw === "string") return raw;
      break;
    }
    case "null": {
      if (
        typeof raw === "string" ||
        typeof raw === "number" ||
        typeof raw === "boolean" ||
        raw instanceof Date
      ) {
        return raw;
      }
      break;
    }
  }

  throw new CompilerInvariantError(
    `Cannot decode driver value of type ${typeof raw} as ${type.name}`,
    { type: type.name },
  );
}

function decodeRows(source: RelationExpr, rows: readonly Row[]): ResultRow[] {
  const columns = relationColumns(source);
  return rows.map((row) => {
    const decoded: Record<string, ResultValue> = {};
    for (const column of columns) {
      decoded[column.name] = decodeValue(column.type, row[column.name]);
    }
    return Object.freeze(decoded);
  });
}

function toCount(raw: unknown): number {
  if (typeof raw === "number") return raw;
  if (typeof raw === "string" || typeof raw === "bigint") return Number(raw);
  throw new CompilerInvariantError("COUNT(*) returned a non-numeric value", {
    type: typeof raw,
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================
// Executor
// ============================================================

export class Executor {
  readonly #dialect: DialectAdapter;
  readonly #adapter: SqlExecutionAdapter;
  readonly #hooks: ExecutorHooks;
  readonly #builder: QueryBuilder;
  readonly #temporaryTables = new Set<string>();
  #closed = false;

  constructor(options: ExecutorOptions) {
    this.#dialect = options.dialect;
    this.#adapter = options.adapter;
    this.#hooks = options.hooks ?? {};
    this.#builder = new QueryBuilder(options.dialect);
  }

  get dialect(): DialectAdapter {
    return this.#dialect;
  }

  get hooks(): ExecutorHooks {
    return this.#hooks;
  }

  /**
   * Evaluates an expression.
   *
   * @throws CardinalityError when a single-row extraction sees zero rows
   * (for `one`) or several rows
   * @throws DatabaseOperationError when the driver fails
   */
  forceEval(expr: RelationExpr): Promise<readonly ResultRow[]>;
  forceEval(expr: ScalarExpr): Promise<ResultValue>;
  forceEval(expr: ListExpr): Promise<readonly EvalResult[]>;
  forceEval(expr: Expr): Promise<EvalResult>;
  async forceEval(expr: Expr): Promise<EvalResult> {
    switch (expr.kind) {
      case "relation": {
        const { rows } = await this.#query("eval", expr.sql);
        return decodeRows(expr, rows);
      }
      case "scalar": {
        return this.#evalScalar(expr);
      }
      case "list": {
        // items run one after another on the same connection
        const results: EvalResult[] = [];
        for (const item of expr.items) {
          results.push(await this.forceEval(item));
        }
        return results;
      }
      case "aggregate": {
        throw new QueryTypeError(
          "An aggregate can only be evaluated inside groupBy",
          { kind: expr.kind },
        );
      }
    }
  }

  /**
   * Number of rows in a relation.
   */
  async count(source: RelationExpr): Promise<number> {
    const { rows } = await this.#query(
      "count",
      this.#builder.countRows(source),
    );
    return toCount(rows[0]?.["count"]);
  }

  /**
   * Names of the tables created by `materialize` and not yet released.
   */
  get temporaryTables(): readonly string[] {
    return [...this.#temporaryTables];
  }

  /**
   * Evaluates `source` once into a temporary table and returns a relation
   * reading that table. The rows are fixed from then on, even when
   * `source` draws random numbers. The table lives until
   * `releaseTemporaryTables` or `close`.
   */
  async materialize(source: RelationExpr): Promise<RelationExpr> {
    const name = `${INTERNAL_TABLE_PREFIX}${generateTableId()}`;
    const columns = relationColumns(source);
    const target = identifier(this.#dialect, name);
    const names = commaList(
      columns.map((column) => identifier(this.#dialect, column.name)),
    );

    await this.#run("materialize", this.#dialect.createTempTable(name, columns));
    this.#temporaryTables.add(name);
    await this.#run(
      "materialize",
      sql`INSERT INTO ${target} (${names}) SELECT ${projectColumns(this.#dialect, "t", columns)} FROM ${subquerySource(source, "t")}`,
    );
    return this.#builder.table(name, source.type.columns);
  }

  async begin(): Promise<void> {
    await this.#run("begin", sql`BEGIN`);
  }

  async commit(): Promise<void> {
    await this.#run("commit", sql`COMMIT`);
  }

  async rollback(): Promise<void> {
    await this.#run("rollback", sql`ROLLBACK`);
  }

  /**
   * Drops every table created by `materialize`. Relations reading them,
   * such as `sampleFast` results, cannot be evaluated afterwards.
   *
   * @returns the number of tables dropped
   */
  async releaseTemporaryTables(): Promise<number> {
    const names = [...this.#temporaryTables];
    for (const name of names) {
      await this.#run(
        "release",
        sql`DROP TABLE IF EXISTS ${identifier(this.#dialect, name)}`,
      );
      this.#temporaryTables.delete(name);
    }
    return names.length;
  }

  /**
   * Releases temporary tables, then closes the adapter. Later calls do
   * nothing.
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    await this.releaseTemporaryTables();
    await this.#adapter.close?.();
  }

  // ============================================================
  // Internals
  // ============================================================

  async #evalScalar(expr: ScalarExpr): Promise<ResultValue> {
    const extraction = expr.extraction;
    if (extraction === undefined) {
      const { rows } = await this.#query(
        "eval",
        sql`SELECT ${aliased(this.#dialect, expr.sql, LIST_COLUMN)}`,
      );
      return decodeValue(expr.type, rows[0]?.[LIST_COLUMN]);
    }

    const { rows, context } = await this.#query(
      "eval",
      extraction.relation.sql,
    );
    const tooMany = rows.length > 1;
    const missing = rows.length === 0 && extraction.cardinality === "one";
    if (tooMany || missing) {
      const error = new CardinalityError({
        expected: extraction.cardinality,
        actual: rows.length,
      });
      this.#hooks.onError?.(context, error);
      throw error;
    }

    const [row] = rows;
    if (row === undefined) return null;
    const column = this.#builder.soleColumn(extraction.relation);
    return decodeValue(expr.type, row[column.name]);
  }

  #context(operation: ExecutorOperation, query: SQL): QueryHookContext {
    const compiled = this.#adapter.compile(query);
    return {
      operationId: generateId(),
      operation,
      startedAt: new Date(),
      sql: compiled.sql,
      params: compiled.params,
    };
  }

  async #query(operation: ExecutorOperation, query: SQL): Promise<QueryOutcome> {
    const context = this.#context(operation, query);
    this.#hooks.onQueryStart?.(context);

    let rows: readonly Row[];
    try {
      rows = await this.#adapter.execute(query);
    } catch (error) {
      throw this.#fail(context, error);
    }

    this.#hooks.onQueryEnd?.(context, {
      rowCount: rows.length,
      durationMs: Date.now() - context.startedAt.getTime(),
    });
    return { rows, context };
  }

  async #run(operation: ExecutorOperation, query: SQL): Promise<void> {
    const context = this.#context(operation, query);
    this.#hooks.onQueryStart?.(context);

    try {
      await this.#adapter.run(query);
    } catch (error) {
      throw this.#fail(context, error);
    }

    this.#hooks.onQueryEnd?.(context, {
      rowCount: 0,
      durationMs: Date.now() - context.startedAt.getTime(),
    });
  }

  #fail(context: QueryHookContext, error: unknown): DatabaseOperationError {
    const wrapped = new DatabaseOperationError(
      `${context.operation} failed: ${errorMessage(error)}`,
      { operation: context.operation, operationId: context.operationId },
      { cause: error },
    );
    this.#hooks.onError?.(context, wrapped);
    return wrapped;
  }
}
