/**
 * Typed expression nodes.
 *
 * Every compiled function returns one of these. Nodes are immutable and
 * carry a drizzle `SQL` fragment plus the type the rendered SQL produces.
 */
import { type SQL } from "drizzle-orm";

import { QueryTypeError } from "../errors";
import {
  formatType,
  listType,
  type ListType,
  type PrimitiveType,
  type RelationType,
  T,
  type ValueType,
} from "./types";

// ============================================================
// Expression Kinds
// ============================================================

/**
 * Row-count expectation attached to a value pulled out of a relation.
 */
export type Cardinality = "one" | "one_or_none";

export type Extraction = Readonly<{
  /** Single-column relation the value comes from */
  relation: RelationExpr;
  cardinality: Cardinality;
}>;

/**
 * A single value.
 *
 * When `extraction` is set the value is a scalar subquery; the executor
 * checks the row count of `extraction.relation` before returning it.
 */
export type ScalarExpr = Readonly<{
  kind: "scalar";
  type: PrimitiveType;
  sql: SQL;
  extraction?: Extraction;
}>;

/**
 * A column inside a grouped context, reducible by a SQL aggregate.
 */
export type AggregateExpr = Readonly<{
  kind: "aggregate";
  type: PrimitiveType;
  sql: SQL;
}>;

/**
 * Zero or more rows. `sql` is a complete SELECT statement.
 */
export type RelationExpr = Readonly<{
  kind: "relation";
  type: RelationType;
  sql: SQL;
}>;

/**
 * An in-memory ordered sequence of expressions.
 */
export type ListExpr = Readonly<{
  kind: "list";
  type: ListType;
  items: readonly Expr[];
}>;

export type Expr = ScalarExpr | AggregateExpr | RelationExpr | ListExpr;

/**
 * Anything accepted where "a column or a list" is expected.
 */
export type Collection = RelationExpr | ListExpr;

// ============================================================
// Constructors
// ============================================================

export function scalar(
  type: PrimitiveType,
  sql: SQL,
  extraction?: Extraction,
): ScalarExpr {
  const node: ScalarExpr =
    extraction === undefined ?
      { kind: "scalar", type, sql }
    : { kind: "scalar", type, sql, extraction };
  return Object.freeze(node);
}

export function aggregate(type: PrimitiveType, sql: SQL): AggregateExpr {
  const node: AggregateExpr = { kind: "aggregate", type, sql };
  return Object.freeze(node);
}

export function relation(type: RelationType, sql: SQL): RelationExpr {
  const node: RelationExpr = { kind: "relation", type, sql };
  return Object.freeze(node);
}

/**
 * Builds a list node. The item type is taken from the first item unless
 * given; an empty list without an explicit type holds `null`.
 *
 * @throws QueryTypeError when items disagree on their type
 */
export function list(items: readonly Expr[], itemType?: ValueType): ListExpr {
  const resolved =
    itemType ??
    items.reduce<ValueType>(
      (widest, item) => widen(widest, typeOfExpr(item)),
      T.null,
    );

  for (const [index, item] of items.entries()) {
    const actual = typeOfExpr(item);
    if (!isAssignable(actual, resolved)) {
      throw new QueryTypeError(
        `List item ${index} has type ${formatType(actual)}, expected ${formatType(resolved)}`,
        { index, expected: formatType(resolved), actual: formatType(actual) },
      );
    }
  }

  const node: ListExpr = {
    kind: "list",
    type: listType(resolved),
    items: Object.freeze([...items]),
  };
  return Object.freeze(node);
}

// ============================================================
// Inspection
// ============================================================

export function typeOfExpr(expr: Expr): ValueType {
  return expr.type;
}

export function isCollection(expr: Expr): expr is Collection {
  return expr.kind === "relation" || expr.kind === "list";
}

/**
 * Describes an expression for error messages, e.g. `aggregate[int]`.
 */
export function describeExpr(expr: Expr): string {
  switch (expr.kind) {
    case "scalar": {
      return expr.type.name;
    }
    case "aggregate": {
      return `aggregate[${expr.type.name}]`;
    }
    case "relation":
    case "list": {
      return formatType(expr.type);
    }
  }
}

function widen(current: ValueType, next: ValueType): ValueType {
  if (current.kind === "primitive" && current.name === "null") {
    return next;
  }
  if (
    current.kind === "primitive" &&
    next.kind === "primitive" &&
    current.name === "int" &&
    next.name === "float"
  ) {
    return next;
  }
  return current;
}

/**
 * Structural compatibility. `int` fits where `float` is expected and
 * `null` fits anywhere.
 */
function isAssignable(actual: ValueType, expected: ValueType): boolean {
  if (actual.kind === "primitive" && actual.name === "null") {
    return true;
  }
  if (actual.kind === "primitive" && expected.kind === "primitive") {
    return (
      actual.name === expected.name ||
      (actual.name === "int" && expected.name === "float")
    );
  }
  if (actual.kind === "list" && expected.kind === "list") {
    return isAssignable(actual.item, expected.item);
  }
  if (actual.kind === "relation" && expected.kind === "relation") {
    const actualNames = Object.keys(actual.columns);
    const expectedNames = Object.keys(expected.columns);
    return (
      actualNames.length === expectedNames.length &&
      actualNames.every((name, index) => expectedNames[index] === name)
    );
  }
  return false;
}
