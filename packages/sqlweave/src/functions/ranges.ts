/**
 * Integer ranges and the algorithms built on them.
 */
import { sql } from "drizzle-orm";

import {
  type Collection,
  relation,
  type RelationExpr,
  scalar,
  type ScalarExpr,
} from "../core/expr";
import { relationType, T } from "../core/types";
import { QueryValueError } from "../errors";
import { LIST_COLUMN, type QueryBuilder } from "../query/builder";
import { commaList } from "../query/dialect/common";
import { aliased, qualified, subquerySource } from "../query/sql-utils";
import { expectScalarType, expectType, type Operand, toScalar } from "./shared";

// ============================================================
// Bounds
// ============================================================

export type FixedBound = Readonly<{ kind: "fixed"; value: number }>;

export type SelectorBound = Readonly<{
  kind: "selector";
  select: (item: ScalarExpr) => ScalarExpr;
}>;

export type RangeBound = FixedBound | SelectorBound;

/**
 * A bound as accepted by `mapRange`: a tagged bound, a number (fixed) or a
 * function of the item (selector).
 */
export type RangeBoundInput =
  | RangeBound
  | number
  | ((item: ScalarExpr) => ScalarExpr);

/**
 * @throws QueryValueError when a fixed bound is not a safe integer
 */
function requireIntegerBound(name: string, bound: RangeBound): RangeBound {
  if (bound.kind === "fixed" && !Number.isSafeInteger(bound.value)) {
    throw new QueryValueError(`mapRange ${name} must be an integer`, {
      constraint: `${name} is an integer`,
      value: bound.value,
    });
  }
  return bound;
}

export function toRangeBound(input: RangeBoundInput): RangeBound {
  if (typeof input === "number") {
    return { kind: "fixed", value: input };
  }
  if (typeof input === "function") {
    return { kind: "selector", select: input };
  }
  return input;
}

// ============================================================
// Functions
// ============================================================

export function createRangeFunctions(qb: QueryBuilder) {
  const dialect = qb.dialect;

  /**
   * Integers `[start, end)` in a `value` column. Empty when
   * `start >= end`.
   */
  function range(start: Operand, end: Operand): RelationExpr {
    const from = expectScalarType("range", toScalar(qb, start), "int");
    const to = expectScalarType("range", toScalar(qb, end), "int");
    const value = qualified(dialect, "r", LIST_COLUMN);

    const handle = qb.beginRecursive({
      name: "int_range",
      columns: { [LIST_COLUMN]: T.int },
      base: sql`SELECT ${from.sql} WHERE ${from.sql} < ${to.sql}`,
      semantics: "multiset",
    });
    handle.setRecursiveStep(
      (self) =>
        sql`SELECT ${self.cast(LIST_COLUMN, sql`${value} + 1`)} FROM ${self.table} AS r WHERE ${value} + 1 < ${to.sql}`,
    );
    return qb.finalizeRecursive(handle);
  }

  /**
   * Characters from `start` to `end`, both inclusive.
   *
   * @example
   * ```typescript
   * fns.charRange("a", "d"); // a, b, c, d
   * ```
   */
  function charRange(start: Operand, end: Operand): RelationExpr {
    const from = expectScalarType("charRange", toScalar(qb, start), "string");
    const to = expectScalarType("charRange", toScalar(qb, end), "string");
    const codes = range(
      scalar(T.int, dialect.charOrd(from.sql)),
      scalar(T.int, sql`(${dialect.charOrd(to.sql)} + 1)`),
    );
    return qb.select(codes, (row) => ({
      [LIST_COLUMN]: scalar(T.string, dialect.char(row.column(LIST_COLUMN).sql)),
    }));
  }

  /**
   * Pairs every item of `lst` with the integers of its range, as
   * `{item, value}` rows.
   *
   * A fixed bound applies to every item and a fixed `end` is exclusive. A
   * selector bound is computed per item and a selector `end` is inclusive.
   * The rows are generated from one global range, `[min start, max end]`,
   * then filtered per item.
   *
   * @example
   * ```typescript
   * fns.mapRange(qb.listOf([1, 5]), 0, (item) => item);
   * // item 1: 0, 1; item 5: 0, 1, 2, 3, 4, 5
   * ```
   */
  function mapRange(
    lst: Collection,
    start: RangeBoundInput,
    end: RangeBoundInput,
  ): RelationExpr {
    const source = qb.toRelation(lst);
    const column = qb.soleColumn(source);
    const startBound = requireIntegerBound("start", toRangeBound(start));
    const endBound = requireIntegerBound("end", toRangeBound(end));

    const selected = (bound: SelectorBound, item: ScalarExpr): ScalarExpr => {
      const value = bound.select(item);
      expectType("mapRange", value.type, ["int"]);
      return value;
    };
    // global bound over all items
    const overall = (bound: RangeBound, reducer: "MIN" | "MAX"): ScalarExpr => {
      if (bound.kind === "fixed") {
        return qb.literal(bound.value, T.int);
      }
      const reduced = qb.select(source, (row) => ({
        [LIST_COLUMN]: scalar(
          T.int,
          sql`${sql.raw(reducer)}(${selected(bound, row.column(column.name)).sql})`,
        ),
      }));
      return qb.one(reduced);
    };

    const globalStart = overall(startBound, "MIN");
    const globalEnd =
      endBound.kind === "fixed" ?
        overall(endBound, "MAX")
      : scalar(T.int, sql`(${overall(endBound, "MAX").sql} + 1)`);
    const values = range(globalStart, globalEnd);

    const item = scalar(column.type, qualified(dialect, "i", column.name));
    const value = qualified(dialect, "v", LIST_COLUMN);
    const filters = [
      ...(startBound.kind === "selector" ?
        [sql`${value} >= ${selected(startBound, item).sql}`]
      : []),
      ...(endBound.kind === "selector" ?
        [sql`${value} <= ${selected(endBound, item).sql}`]
      : []),
    ];
    const where =
      filters.length === 0 ? sql`` : sql` WHERE ${sql.join(filters, sql` AND `)}`;

    return relation(
      relationType({ item: column.type, [LIST_COLUMN]: T.int }),
      sql`SELECT ${aliased(dialect, item.sql, "item")}, ${aliased(dialect, value, LIST_COLUMN)} FROM ${subquerySource(source, "i")} CROSS JOIN ${subquerySource(values, "v")}${where}`,
    );
  }

  /**
   * Median of a numeric collection, as float; null when empty.
   *
   * Items are numbered in sorted order; the median is the mean of the
   * `2 - count % 2` items starting at `(count - 1) / 2`.
   */
  function listMedian(x: Collection): ScalarExpr {
    const source = qb.toRelation(x);
    const column = qb.soleColumn(source);
    expectType("listMedian", column.type, ["float"]);

    const item = qualified(dialect, "t", column.name);
    const v = qualified(dialect, "o", "v");
    const pos = qualified(dialect, "o", "pos");
    const cnt = qualified(dialect, "o", "cnt");
    const offset = dialect.intDiv(sql`(${cnt} - 1)`, sql.raw("2"));
    const ordered = sql`SELECT ${commaList([
      aliased(dialect, item, "v"),
      aliased(dialect, sql`(ROW_NUMBER() OVER (ORDER BY ${item}) - 1)`, "pos"),
      aliased(dialect, sql`COUNT(*) OVER ()`, "cnt"),
    ])} FROM ${subquerySource(source, "t")}`;

    return qb.one(
      relation(
        relationType({ [LIST_COLUMN]: T.float }),
        sql`SELECT ${aliased(dialect, sql`AVG(${dialect.castFloat(v)})`, LIST_COLUMN)} FROM (${ordered}) AS o WHERE ${pos} >= ${offset} AND ${pos} < ${offset} + (2 - ${cnt} % 2)`,
      ),
    );
  }

  return { range, charRange, mapRange, listMedian };
}
