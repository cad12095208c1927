/**
 * Aggregate dispatcher.
 *
 * `compileAggregate` reduces a collection with a SQL aggregate. The
 * argument is classified first:
 *
 * - an aggregate (a column inside GROUP BY) is reduced in place;
 * - a one-column relation or a list of primitives is reduced by a
 *   subquery whose single row is extracted;
 * - a list of collections is reduced item by item, giving a list of
 *   results in the same order.
 */
import { type SQL, sql } from "drizzle-orm";

import {
  type AggregateExpr,
  describeExpr,
  type Expr,
  list,
  type ListExpr,
  type RelationExpr,
  scalar,
  type ScalarExpr,
} from "../core/expr";
import {
  collectionElementType,
  isNumeric,
  type PrimitiveType,
  T,
} from "../core/types";
import { QueryTypeError, UnsupportedOperationError } from "../errors";
import { LIST_COLUMN, type QueryBuilder } from "../query/builder";
import { type DialectAdapter } from "../query/dialect";
import { unsupportedArgument } from "./shared";

// ============================================================
// Aggregate Kinds
// ============================================================

export type AggregateKind =
  | "SUM"
  | "AVG"
  | "MIN"
  | "MAX"
  | "FIRST"
  | "FIRST_OR_NULL"
  | "COUNT_TRUE"
  | "COUNT_FALSE"
  | "COUNT_DISTINCT";

type ElementRequirement = "numeric" | "bool" | "any";

type AggregateSpec = Readonly<{
  /** Public function name, used in error messages */
  label: string;
  elements: ElementRequirement;
  resultType: (element: PrimitiveType) => PrimitiveType;
  /** Reduces a column reference inside an aggregate context */
  reduce: (dialect: DialectAdapter, value: SQL) => SQL;
  /** Dialect-only aggregates report whether the dialect has them */
  available?: (dialect: DialectAdapter) => boolean;
}>;

const sameType = (element: PrimitiveType): PrimitiveType => element;
const intResult = (): PrimitiveType => T.int;

const AGGREGATE_SPECS: Readonly<Record<AggregateKind, AggregateSpec>> = {
  SUM: {
    label: "sum",
    elements: "numeric",
    resultType: sameType,
    reduce: (_dialect, value) => sql`SUM(${value})`,
  },
  AVG: {
    label: "mean",
    elements: "numeric",
    // integer inputs would otherwise average with integer division
    resultType: () => T.float,
    reduce: (dialect, value) => sql`AVG(${dialect.castFloat(value)})`,
  },
  MIN: {
    label: "min",
    elements: "numeric",
    resultType: sameType,
    reduce: (_dialect, value) => sql`MIN(${value})`,
  },
  MAX: {
    label: "max",
    elements: "numeric",
    resultType: sameType,
    reduce: (_dialect, value) => sql`MAX(${value})`,
  },
  FIRST: {
    label: "first",
    elements: "any",
    resultType: sameType,
    reduce: (dialect, value) => dialect.firstInGroup(value),
  },
  FIRST_OR_NULL: {
    label: "firstOrNull",
    elements: "any",
    resultType: sameType,
    reduce: (dialect, value) => dialect.firstInGroup(value),
  },
  COUNT_TRUE: {
    label: "countTrue",
    elements: "bool",
    resultType: intResult,
    reduce: (dialect, value) => dialect.countTrue(value),
  },
  COUNT_FALSE: {
    label: "countFalse",
    elements: "bool",
    resultType: intResult,
    reduce: (dialect, value) => dialect.countFalse(value),
  },
  COUNT_DISTINCT: {
    label: "countDistinct",
    elements: "any",
    resultType: intResult,
    available: (dialect) => dialect.countDistinct !== undefined,
    reduce: (dialect, value) => {
      if (dialect.countDistinct === undefined) {
        throw unsupported("countDistinct", dialect);
      }
      return dialect.countDistinct(value);
    },
  },
};

export function unsupported(
  name: string,
  dialect: DialectAdapter,
): UnsupportedOperationError {
  return new UnsupportedOperationError(
    `${name} is not supported by the ${dialect.name} dialect`,
    { function: name, dialect: dialect.name },
  );
}

// ============================================================
// Classification
// ============================================================

type AggregateTarget =
  | Readonly<{ tag: "aggregate"; expr: AggregateExpr }>
  | Readonly<{ tag: "column"; relation: RelationExpr }>
  | Readonly<{ tag: "nested"; items: readonly Expr[] }>
  | Readonly<{ tag: "unsupported"; expr: Expr }>;

function classify(qb: QueryBuilder, obj: Expr): AggregateTarget {
  switch (obj.kind) {
    case "aggregate": {
      return { tag: "aggregate", expr: obj };
    }
    case "relation": {
      return { tag: "column", relation: obj };
    }
    case "list": {
      const nested =
        obj.type.item.kind !== "primitive" ||
        obj.items.some((item) => item.kind !== "scalar");
      return nested ?
          { tag: "nested", items: obj.items }
        : { tag: "column", relation: qb.toRelation(obj) };
    }
    case "scalar": {
      return { tag: "unsupported", expr: obj };
    }
  }
}

function inferElementType(obj: Expr): PrimitiveType | undefined {
  switch (obj.kind) {
    case "aggregate": {
      return obj.type;
    }
    case "relation":
    case "list": {
      return collectionElementType(obj.type);
    }
    case "scalar": {
      return undefined;
    }
  }
}

function meetsRequirement(
  requirement: ElementRequirement,
  element: PrimitiveType,
): boolean {
  // an empty list has no element type to check
  if (element.name === "null") return true;
  switch (requirement) {
    case "numeric": {
      return isNumeric(element);
    }
    case "bool": {
      return element.name === "bool";
    }
    case "any": {
      return true;
    }
  }
}

// ============================================================
// Dispatcher
// ============================================================

/**
 * Compiles `kind` over `obj`.
 *
 * @param elementType - Element type to check instead of inferring it
 * @throws QueryTypeError when `obj` has the wrong shape or element type
 * @throws UnsupportedOperationError when the dialect lacks the aggregate
 */
export function compileAggregate(
  qb: QueryBuilder,
  kind: AggregateKind,
  obj: Expr,
  elementType?: PrimitiveType,
): ScalarExpr | ListExpr {
  const spec = AGGREGATE_SPECS[kind];
  if (spec.available !== undefined && !spec.available(qb.dialect)) {
    throw unsupported(spec.label, qb.dialect);
  }

  const element = elementType ?? inferElementType(obj);
  if (element === undefined) {
    throw new QueryTypeError(
      `${spec.label} only accepts lists or tables with one column`,
      { function: spec.label, type: describeExpr(obj) },
    );
  }
  if (!meetsRequirement(spec.elements, element)) {
    throw new QueryTypeError(
      `${spec.label} expects ${spec.elements === "bool" ? "boolean" : "numeric"} elements`,
      { function: spec.label, elementType: element.name },
    );
  }

  const resultType = spec.resultType(element);

  if (
    kind === "FIRST_OR_NULL" &&
    obj.kind === "list" &&
    obj.items.length === 0
  ) {
    return qb.literal(null, resultType);
  }

  const target = classify(qb, obj);
  switch (target.tag) {
    case "aggregate": {
      return scalar(resultType, spec.reduce(qb.dialect, target.expr.sql));
    }
    case "column": {
      return reduceColumn(qb, kind, spec, target.relation, resultType);
    }
    case "nested": {
      return list(
        target.items.map((item) =>
          compileAggregate(qb, kind, item, elementType),
        ),
      );
    }
    case "unsupported": {
      throw unsupportedArgument(spec.label, target.expr);
    }
  }
}

function reduceColumn(
  qb: QueryBuilder,
  kind: AggregateKind,
  spec: AggregateSpec,
  source: RelationExpr,
  resultType: PrimitiveType,
): ScalarExpr {
  const column = qb.soleColumn(source);

  if (kind === "FIRST" || kind === "FIRST_OR_NULL") {
    const head = qb.limit(
      qb.select(source, (row) => ({ [LIST_COLUMN]: row.column(column.name) })),
      1,
    );
    return kind === "FIRST" ? qb.one(head) : qb.oneOrNone(head);
  }

  const reduced = qb.select(source, (row) => ({
    [LIST_COLUMN]: scalar(
      resultType,
      spec.reduce(qb.dialect, row.column(column.name).sql),
    ),
  }));
  return qb.one(reduced);
}

/**
 * Row count of a relation or list, `COUNT(x)` of an aggregate, or the
 * per-item counts of a list of collections.
 */
export function compileCount(
  qb: QueryBuilder,
  obj: Expr,
): ScalarExpr | ListExpr {
  switch (obj.kind) {
    case "aggregate": {
      return scalar(T.int, sql`COUNT(${obj.sql})`);
    }
    case "relation": {
      return qb.one(
        qb.select(obj, () => ({ [LIST_COLUMN]: scalar(T.int, sql`COUNT(*)`) })),
      );
    }
    case "list": {
      const target = classify(qb, obj);
      if (target.tag === "nested") {
        return list(target.items.map((item) => compileCount(qb, item)));
      }
      return compileCount(qb, qb.toRelation(obj));
    }
    case "scalar": {
      throw unsupportedArgument("count", obj);
    }
  }
}

// ============================================================
// Public Surface
// ============================================================

/**
 * An aggregate over an aggregate or a relation always yields one value;
 * over a list it may yield a list of per-item values.
 */
export type AggregateFunction = {
  (obj: AggregateExpr | RelationExpr, elementType?: PrimitiveType): ScalarExpr;
  (obj: Expr, elementType?: PrimitiveType): ScalarExpr | ListExpr;
};

function aggregateFunction(
  qb: QueryBuilder,
  kind: AggregateKind,
): AggregateFunction {
  function apply(
    obj: AggregateExpr | RelationExpr,
    elementType?: PrimitiveType,
  ): ScalarExpr;
  function apply(obj: Expr, elementType?: PrimitiveType): ScalarExpr | ListExpr;
  function apply(obj: Expr, elementType?: PrimitiveType): ScalarExpr | ListExpr {
    return compileAggregate(qb, kind, obj, elementType);
  }
  return apply;
}

export function createAggregateFunctions(qb: QueryBuilder) {
  function count(obj: AggregateExpr | RelationExpr): ScalarExpr;
  function count(obj: Expr): ScalarExpr | ListExpr;
  function count(obj: Expr): ScalarExpr | ListExpr {
    return compileCount(qb, obj);
  }

  return {
    sum: aggregateFunction(qb, "SUM"),
    mean: aggregateFunction(qb, "AVG"),
    min: aggregateFunction(qb, "MIN"),
    max: aggregateFunction(qb, "MAX"),
    first: aggregateFunction(qb, "FIRST"),
    firstOrNull: aggregateFunction(qb, "FIRST_OR_NULL"),
    count,
    countTrue: aggregateFunction(qb, "COUNT_TRUE"),
    countFalse: aggregateFunction(qb, "COUNT_FALSE"),
    countDistinct: aggregateFunction(qb, "COUNT_DISTINCT"),
  };
}
