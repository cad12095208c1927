/**
 * Type conversions.
 *
 * Scalars and aggregates convert between primitives: float and bool to
 * int, int and bool to float, any primitive to string. A collection
 * converts to a list through its single column. List elements are
 * converted one by one; a table's column must already hold the target
 * element type.
 *
 * @example
 * ```typescript
 * fns.cast(fns.mean(scores), T.int);
 * fns.cast(qb.table("users", { name: T.string }), listType(T.string));
 * ```
 */
import { type SQL } from "drizzle-orm";

import {
  aggregate,
  type AggregateExpr,
  type Collection,
  type RelationExpr,
  scalar,
  type ScalarExpr,
} from "../core/expr";
import {
  formatType,
  type ListType,
  type PrimitiveType,
} from "../core/types";
import { QueryTypeError } from "../errors";
import { LIST_COLUMN, type QueryBuilder } from "../query/builder";
import { type DialectAdapter } from "../query/dialect";
import { relationColumns } from "../query/sql-utils";
import { isCollectionArgument, type Operand, toScalar } from "./shared";

export type CastTarget = PrimitiveType | ListType;

/**
 * SQL converting `value` from one primitive to another. Equal types and
 * `null` pass through unchanged.
 *
 * @throws QueryTypeError for conversions that have no SQL form
 */
export function convertPrimitive(
  dialect: DialectAdapter,
  from: PrimitiveType,
  to: PrimitiveType,
  value: SQL,
): SQL {
  if (from.name === to.name || from.name === "null") return value;

  switch (to.name) {
    case "int": {
      if (from.name === "float" || from.name === "bool") {
        return dialect.castInt(value);
      }
      break;
    }
    case "float": {
      if (from.name === "int") return dialect.castFloat(value);
      // PostgreSQL casts boolean only to integer
      if (from.name === "bool") return dialect.castFloat(dialect.castInt(value));
      break;
    }
    case "string": {
      return dialect.castString(value);
    }
    case "bool":
    case "datetime":
    case "null": {
      break;
    }
  }

  throw new QueryTypeError(`Cast not implemented for ${from.name}->${to.name}`, {
    function: "cast",
    from: from.name,
    to: to.name,
  });
}

function castCollection(
  qb: QueryBuilder,
  value: Collection,
  target: ListType,
): RelationExpr {
  const element = target.item;
  if (element.kind !== "primitive") {
    throw new QueryTypeError(
      `Cannot cast ${formatType(value.type)} to ${formatType(target)}. Elements must be primitive`,
      { function: "cast", target: formatType(target) },
    );
  }

  const source = qb.toRelation(value);
  if (value.kind === "relation") {
    if (relationColumns(source).length !== 1) {
      throw new QueryTypeError(
        `Cannot cast ${formatType(value.type)} to ${formatType(target)}. Too many columns`,
        { function: "cast", target: formatType(target) },
      );
    }
    const { type } = qb.soleColumn(source);
    if (type.name !== element.name && type.name !== "null") {
      throw new QueryTypeError(
        `Cannot cast ${formatType(value.type)} to ${formatType(target)}. Elements not matching`,
        { function: "cast", target: formatType(target) },
      );
    }
  }

  const column = qb.soleColumn(source);
  return qb.select(source, (row) => ({
    [LIST_COLUMN]: scalar(
      element,
      convertPrimitive(
        qb.dialect,
        column.type,
        element,
        row.column(column.name).sql,
      ),
    ),
  }));
}

function isAggregateArgument(
  value: Operand | AggregateExpr | Collection,
): value is AggregateExpr {
  return (
    value !== null &&
    typeof value === "object" &&
    !(value instanceof Date) &&
    value.kind === "aggregate"
  );
}

export type CastFunction = {
  (value: Operand, target: PrimitiveType): ScalarExpr;
  (value: AggregateExpr, target: PrimitiveType): AggregateExpr;
  (value: Collection, target: ListType): RelationExpr;
  (
    value: Operand | AggregateExpr | Collection,
    target: CastTarget,
  ): ScalarExpr | AggregateExpr | RelationExpr;
};

export function createCastFunctions(qb: QueryBuilder) {
  function cast(value: Operand, target: PrimitiveType): ScalarExpr;
  function cast(value: AggregateExpr, target: PrimitiveType): AggregateExpr;
  function cast(value: Collection, target: ListType): RelationExpr;
  function cast(
    value: Operand | AggregateExpr | Collection,
    target: CastTarget,
  ): ScalarExpr | AggregateExpr | RelationExpr;
  function cast(
    value: Operand | AggregateExpr | Collection,
    target: CastTarget,
  ): ScalarExpr | AggregateExpr | RelationExpr {
    if (isAggregateArgument(value)) {
      if (target.kind !== "primitive") {
        throw new QueryTypeError(
          `Cannot cast aggregate[${value.type.name}] to ${formatType(target)}`,
          { function: "cast", target: formatType(target) },
        );
      }
      return aggregate(
        target,
        convertPrimitive(qb.dialect, value.type, target, value.sql),
      );
    }

    if (isCollectionArgument(value)) {
      if (target.kind !== "list") {
        throw new QueryTypeError(
          `Cannot cast ${formatType(value.type)} to ${formatType(target)}`,
          { function: "cast", target: formatType(target) },
        );
      }
      return castCollection(qb, value, target);
    }

    const input = toScalar(qb, value);
    if (target.kind !== "primitive") {
      throw new QueryTypeError(
        `Cannot cast ${input.type.name} to ${formatType(target)}`,
        { function: "cast", target: formatType(target) },
      );
    }
    if (input.type.name === target.name) return input;
    return scalar(
      target,
      convertPrimitive(qb.dialect, input.type, target, input.sql),
      input.extraction,
    );
  }

  return { cast: cast satisfies CastFunction };
}
