/**
 * Argument handling shared by the function modules.
 */
import {
  type Collection,
  describeExpr,
  type Expr,
  type ScalarExpr,
} from "../core/expr";
import { type PrimitiveName, type PrimitiveType } from "../core/types";
import { QueryTypeError, QueryValueError } from "../errors";
import { type QueryBuilder } from "../query/builder";
import { type LiteralValue } from "../query/dialect";

/**
 * A scalar expression, or a JavaScript value bound as a literal.
 */
export type Operand = ScalarExpr | LiteralValue;

export function toScalar(qb: QueryBuilder, value: Operand): ScalarExpr {
  if (value === null || typeof value !== "object" || value instanceof Date) {
    return qb.literal(value);
  }
  return value;
}

export function isCollectionArgument(
  value: Operand | Collection,
): value is Collection {
  return (
    value !== null &&
    typeof value === "object" &&
    !(value instanceof Date) &&
    (value.kind === "relation" || value.kind === "list")
  );
}

/**
 * Checks an element type. `int` is accepted where `float` is expected and
 * `null` is accepted anywhere.
 *
 * @throws QueryTypeError on mismatch
 */
export function expectType(
  label: string,
  type: PrimitiveType,
  expected: readonly PrimitiveName[],
): void {
  const actual = type.name;
  const accepted =
    actual === "null" ||
    expected.includes(actual) ||
    (actual === "int" && expected.includes("float"));
  if (!accepted) {
    throw new QueryTypeError(
      `${label} expects ${expected.join(" or ")}, got ${actual}`,
      { function: label, expected, actual },
    );
  }
}

export function expectScalarType(
  label: string,
  expr: ScalarExpr,
  ...expected: readonly PrimitiveName[]
): ScalarExpr {
  expectType(label, expr.type, expected);
  return expr;
}

export function unsupportedArgument(label: string, expr: Expr): QueryTypeError {
  return new QueryTypeError(
    `${label} doesn't support object of type '${describeExpr(expr)}'`,
    { function: label, type: describeExpr(expr) },
  );
}

/**
 * @throws QueryValueError unless `value` is a safe integer `>= minimum`
 */
export function requireInteger(
  name: string,
  value: number,
  minimum: number,
): number {
  if (!Number.isSafeInteger(value) || value < minimum) {
    const message =
      minimum === 1 ? `${name} must be a positive integer`
      : minimum === 0 ? `${name} must be a non-negative integer`
      : `${name} must be an integer >= ${minimum}`;
    throw new QueryValueError(message, {
      constraint: `${name} >= ${minimum}`,
      value,
    });
  }
  return value;
}
