/**
 * Small SQL assembly helpers shared by the function compilers.
 */
import { type SQL, sql } from "drizzle-orm";

import { type RelationExpr } from "../core/expr";
import { type FlatColumn, flattenColumns } from "../core/types";
import { type DialectAdapter } from "./dialect";

/**
 * Quotes an identifier for the dialect and wraps it as raw SQL.
 */
export function identifier(dialect: DialectAdapter, name: string): SQL {
  return sql.raw(dialect.quoteIdentifier(name));
}

/**
 * `alias."column"`
 */
export function qualified(
  dialect: DialectAdapter,
  alias: string,
  column: string,
): SQL {
  return sql.raw(`${alias}.${dialect.quoteIdentifier(column)}`);
}

/**
 * `(SELECT ...) AS alias`, for use in a FROM or JOIN clause.
 */
export function subquerySource(relation: RelationExpr, alias: string): SQL {
  return sql`(${relation.sql}) AS ${sql.raw(alias)}`;
}

export function relationColumns(relation: RelationExpr): FlatColumn[] {
  return flattenColumns(relation.type.columns);
}

/**
 * `alias."a", alias."b"` for every rendered column of a relation.
 */
export function projectColumns(
  dialect: DialectAdapter,
  alias: string,
  columns: readonly FlatColumn[],
): SQL {
  return sql.join(
    columns.map((column) => qualified(dialect, alias, column.name)),
    sql`, `,
  );
}

/**
 * `expr AS "name"`
 */
export function aliased(
  dialect: DialectAdapter,
  expression: SQL,
  name: string,
): SQL {
  return sql`${expression} AS ${identifier(dialect, name)}`;
}

/**
 * Validates a user-supplied integer parameter.
 */
export function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
