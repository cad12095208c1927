/**
 * Two-phase builder for recursive CTEs.
 *
 * ```typescript
 * const handle = beginRecursive(dialect, {
 *   name: "bfs",
 *   columns: { id: T.int },
 *   base: sql`SELECT t."value" FROM (...) AS t`,
 *   semantics: "set",
 * });
 * handle.setRecursiveStep((self) => sql`SELECT ... FROM ${self.table} AS r ...`);
 * const reachable = finalizeRecursive(handle);
 * ```
 *
 * The step callback receives a forward reference to the CTE that is still
 * being defined; the definition is closed only by `finalizeRecursive`.
 *
 * Steps project their columns through `self.cast`. On dialects where the
 * base term fixes the column types, `finalizeRecursive` casts the base term
 * too, so a BIGINT edge table and an int literal agree on the CTE type.
 */
import { type SQL, sql } from "drizzle-orm";

import { type RelationExpr, relation } from "../../core/expr";
import {
  type PrimitiveType,
  relationType,
  type RelationType,
} from "../../core/types";
import { CompilerInvariantError } from "../../errors";
import { type DialectAdapter } from "../dialect";
import { commaList } from "../dialect/common";
import { identifier, qualified } from "../sql-utils";
import { validateSqlIdentifier } from "./validation";

// ============================================================
// Types
// ============================================================

/**
 * `set` merges iterations with UNION (duplicates dropped, so cycles
 * terminate); `multiset` uses UNION ALL and relies on a guard in the step.
 */
export type RecursiveSemantics = "set" | "multiset";

export type RecursiveDefinition = Readonly<{
  name: string;
  columns: Readonly<Record<string, PrimitiveType>>;
  /** Non-recursive SELECT producing `columns` in order */
  base: SQL;
  semantics: RecursiveSemantics;
}>;

/**
 * Forward reference to the CTE under construction.
 */
export type RecursiveReference = Readonly<{
  name: string;
  /** Quoted CTE name, usable in a FROM clause */
  table: SQL;
  type: RelationType;
  /** `alias."column"` for a column of the CTE */
  column: (alias: string, name: string) => SQL;
  /** Casts a projected value to the declared type of column `name` */
  cast: (name: string, value: SQL) => SQL;
}>;

// ============================================================
// Handle
// ============================================================

export class RecursiveQueryHandle {
  readonly self: RecursiveReference;
  readonly #dialect: DialectAdapter;
  readonly #definition: RecursiveDefinition;
  #step: SQL | undefined;

  constructor(dialect: DialectAdapter, definition: RecursiveDefinition) {
    validateSqlIdentifier(definition.name, "table");
    for (const column of Object.keys(definition.columns)) {
      validateSqlIdentifier(column);
    }

    this.#dialect = dialect;
    this.#definition = definition;
    this.self = Object.freeze({
      name: definition.name,
      table: identifier(dialect, definition.name),
      type: relationType(definition.columns),
      column: (alias: string, name: string) => qualified(dialect, alias, name),
      cast: (name: string, value: SQL) =>
        dialect.castAs(value, this.#columnType(name)),
    });
  }

  get dialect(): DialectAdapter {
    return this.#dialect;
  }

  get definition(): RecursiveDefinition {
    return this.#definition;
  }

  get step(): SQL | undefined {
    return this.#step;
  }

  /**
   * Binds the recursive branch. May be called once.
   */
  setRecursiveStep(build: (self: RecursiveReference) => SQL): this {
    if (this.#step !== undefined) {
      throw new CompilerInvariantError(
        `Recursive step for "${this.#definition.name}" is already set`,
        { name: this.#definition.name },
      );
    }
    this.#step = build(this.self);
    return this;
  }

  #columnType(name: string): PrimitiveType {
    const type = this.#definition.columns[name];
    if (type === undefined) {
      throw new CompilerInvariantError(
        `Recursive query "${this.#definition.name}" has no column "${name}"`,
        { name: this.#definition.name, column: name },
      );
    }
    return type;
  }
}

// ============================================================
// Phases
// ============================================================

export function beginRecursive(
  dialect: DialectAdapter,
  definition: RecursiveDefinition,
): RecursiveQueryHandle {
  return new RecursiveQueryHandle(dialect, definition);
}

/**
 * Closes the definition into
 * `WITH RECURSIVE name(cols) AS (base UNION [ALL] step) SELECT cols FROM name`.
 * With `typedRecursiveColumns` the base becomes
 * `SELECT CAST(b.col AS type), ... FROM (base) AS b(cols)`.
 *
 * @throws CompilerInvariantError if no recursive step was bound
 */
export function finalizeRecursive(handle: RecursiveQueryHandle): RelationExpr {
  const { step, dialect, definition } = handle;
  if (step === undefined) {
    throw new CompilerInvariantError(
      `Recursive query "${definition.name}" was finalized without a recursive step`,
      { name: definition.name },
    );
  }

  const names = Object.keys(definition.columns);
  const cte = identifier(dialect, definition.name);
  const declared = commaList(names.map((name) => identifier(dialect, name)));
  const projected = commaList(
    names.map((name) => qualified(dialect, dialect.quoteIdentifier(definition.name), name)),
  );
  const union =
    definition.semantics === "set" ? sql.raw("UNION") : sql.raw("UNION ALL");
  const base =
    dialect.capabilities.typedRecursiveColumns ?
      sql`SELECT ${commaList(
        names.map((name) =>
          handle.self.cast(name, qualified(dialect, "b", name)),
        ),
      )} FROM (${definition.base}) AS b(${declared})`
    : definition.base;

  return relation(
    handle.self.type,
    sql`WITH RECURSIVE ${cte}(${declared}) AS (${base} ${union} ${step}) SELECT ${projected} FROM ${cte}`,
  );
}

/**
 * FROM clause joining the worktable to another source.
 *
 * The worktable always comes first. Dialects that need the order enforced
 * get a CROSS JOIN, which their planners never reorder, with the join
 * condition moved to WHERE.
 */
export function joinWorktable(
  dialect: DialectAdapter,
  self: RecursiveReference,
  selfAlias: string,
  source: SQL,
  sourceAlias: string,
  on: SQL,
): SQL {
  if (dialect.capabilities.forceRecursiveWorktableOuterJoinOrder) {
    return sql`${self.table} AS ${sql.raw(selfAlias)} CROSS JOIN (${source}) AS ${sql.raw(sourceAlias)} WHERE ${on}`;
  }
  return sql`${self.table} AS ${sql.raw(selfAlias)} JOIN (${source}) AS ${sql.raw(sourceAlias)} ON ${on}`;
}
