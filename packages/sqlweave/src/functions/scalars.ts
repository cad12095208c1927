/**
 * String, number and time functions.
 *
 * `upper`, `lower`, `length` and `round` are "maybe vectorized": given a
 * scalar they return a scalar, given a one-column collection they return a
 * one-column relation with the function applied to every row. The rest map
 * one-to-one onto dialect primitives.
 */
import { type SQL } from "drizzle-orm";

import {
  type Collection,
  type RelationExpr,
  scalar,
  type ScalarExpr,
} from "../core/expr";
import { type PrimitiveName, type PrimitiveType, T } from "../core/types";
import { QueryTypeError } from "../errors";
import { LIST_COLUMN, type QueryBuilder } from "../query/builder";
import { type DatePart } from "../query/dialect";
import { unsupported } from "./aggregates";
import {
  expectScalarType,
  expectType,
  isCollectionArgument,
  type Operand,
  toScalar,
} from "./shared";

// ============================================================
// Maybe-Vectorized Functions
// ============================================================

export type VectorizedFunction<TExtra extends unknown[] = []> = {
  (value: Operand, ...extra: TExtra): ScalarExpr;
  (value: Collection, ...extra: TExtra): RelationExpr;
};

type VectorizedSpec = Readonly<{
  label: string;
  accepts: readonly PrimitiveName[];
  resultType: (input: PrimitiveType) => PrimitiveType;
}>;

/**
 * Applies `apply` to a scalar, or to every row of a one-column collection.
 */
function applyMaybeVectorized(
  qb: QueryBuilder,
  spec: VectorizedSpec,
  value: Operand | Collection,
  apply: (input: SQL) => SQL,
): ScalarExpr | RelationExpr {
  if (!isCollectionArgument(value)) {
    const input = toScalar(qb, value);
    expectScalarType(spec.label, input, ...spec.accepts);
    return scalar(spec.resultType(input.type), apply(input.sql));
  }

  const source = qb.toRelation(value);
  const column = qb.soleColumn(source);
  expectType(spec.label, column.type, spec.accepts);
  return qb.select(source, (row) => ({
    [LIST_COLUMN]: scalar(
      spec.resultType(column.type),
      apply(row.column(column.name).sql),
    ),
  }));
}

export function createScalarFunctions(qb: QueryBuilder) {
  const dialect = qb.dialect;

  function upper(value: Operand): ScalarExpr;
  function upper(value: Collection): RelationExpr;
  function upper(value: Operand | Collection): ScalarExpr | RelationExpr {
    return applyMaybeVectorized(
      qb,
      { label: "upper", accepts: ["string"], resultType: () => T.string },
      value,
      (input) => dialect.upper(input),
    );
  }

  function lower(value: Operand): ScalarExpr;
  function lower(value: Collection): RelationExpr;
  function lower(value: Operand | Collection): ScalarExpr | RelationExpr {
    return applyMaybeVectorized(
      qb,
      { label: "lower", accepts: ["string"], resultType: () => T.string },
      value,
      (input) => dialect.lower(input),
    );
  }

  function length(value: Operand): ScalarExpr;
  function length(value: Collection): RelationExpr;
  function length(value: Operand | Collection): ScalarExpr | RelationExpr {
    return applyMaybeVectorized(
      qb,
      { label: "length", accepts: ["string"], resultType: () => T.int },
      value,
      (input) => dialect.length(input),
    );
  }

  function round(value: Operand, digits?: number): ScalarExpr;
  function round(value: Collection, digits?: number): RelationExpr;
  function round(
    value: Operand | Collection,
    digits = 0,
  ): ScalarExpr | RelationExpr {
    if (!Number.isSafeInteger(digits)) {
      throw new QueryTypeError("round expects an integer number of digits", {
        function: "round",
        digits,
      });
    }
    const places = qb.literal(digits, T.int).sql;
    return applyMaybeVectorized(
      qb,
      { label: "round", accepts: ["float"], resultType: () => T.float },
      value,
      (input) => dialect.round(input, places),
    );
  }

  // ============================================================
  // Dialect Primitives
  // ============================================================

  const datePart =
    (part: DatePart, label: string) =>
    (value: Operand): ScalarExpr => {
      if (dialect.datePart === undefined) {
        throw unsupported(label, dialect);
      }
      const input = expectScalarType(label, toScalar(qb, value), "datetime");
      return scalar(T.int, dialect.datePart(part, input.sql));
    };

  return {
    upper: upper satisfies VectorizedFunction,
    lower: lower satisfies VectorizedFunction,
    length: length satisfies VectorizedFunction,
    round: round satisfies VectorizedFunction<[digits?: number]>,

    /** A uniform float in [0, 1), drawn per evaluation. */
    random(): ScalarExpr {
      return scalar(T.float, dialect.random());
    },

    /**
     * 0-based index of `needle` in `haystack`, negative when absent.
     */
    strIndex(needle: Operand, haystack: Operand): ScalarExpr {
      const n = expectScalarType("strIndex", toScalar(qb, needle), "string");
      const h = expectScalarType("strIndex", toScalar(qb, haystack), "string");
      return scalar(T.int, dialect.strIndex(n.sql, h.sql));
    },

    char(code: Operand): ScalarExpr {
      const input = expectScalarType("char", toScalar(qb, code), "int");
      return scalar(T.string, dialect.char(input.sql));
    },

    charOrd(value: Operand): ScalarExpr {
      const input = expectScalarType("charOrd", toScalar(qb, value), "string");
      return scalar(T.int, dialect.charOrd(input.sql));
    },

    repeat(value: Operand, times: Operand): ScalarExpr {
      const input = expectScalarType("repeat", toScalar(qb, value), "string");
      const count = expectScalarType("repeat", toScalar(qb, times), "int");
      return scalar(T.string, dialect.repeat(input.sql, count.sql));
    },

    now(): ScalarExpr {
      return scalar(T.datetime, dialect.now());
    },

    pi(): ScalarExpr {
      return scalar(T.float, dialect.pi());
    },

    year: datePart("year", "year"),
    month: datePart("month", "month"),
    day: datePart("day", "day"),
    hour: datePart("hour", "hour"),
    minute: datePart("minute", "minute"),
    dayOfWeek: datePart("day_of_week", "dayOfWeek"),
    weekOfYear: datePart("week_of_year", "weekOfYear"),
  };
}
