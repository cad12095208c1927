/**
 * Row-level relational helpers: limits, pagination, numbering,
 * deduplication and positional joins.
 */
import { type SQL, sql } from "drizzle-orm";

import {
  type Collection,
  relation,
  type RelationExpr,
  scalar,
  type ScalarExpr,
} from "../core/expr";
import {
  type FlatColumn,
  relationType,
  structType,
  T,
} from "../core/types";
import { QueryTypeError } from "../errors";
import { type QueryBuilder } from "../query/builder";
import { commaList } from "../query/dialect/common";
import {
  aliased,
  projectColumns,
  qualified,
  relationColumns,
  subquerySource,
} from "../query/sql-utils";
import { requireInteger } from "./shared";

export const DEFAULT_PAGE_SIZE = 20;

/** Row-number column added to each side of a positional join. */
const ZIP_INDEX = "zip_index";

export type ZipJoinKind = "inner" | "left" | "full";

/**
 * `0`-based row number, in the order rows reach the window.
 */
function rowIndex(): SQL {
  return sql`(ROW_NUMBER() OVER () - 1)`;
}

/**
 * Positional join: row `i` of `left` pairs with row `i` of `right`.
 * Output columns are structs `a` and `b`, rendered as `a_<col>` and
 * `b_<col>`.
 */
export function zipjoinRelations(
  qb: QueryBuilder,
  left: RelationExpr,
  right: RelationExpr,
  kind: ZipJoinKind,
): RelationExpr {
  const dialect = qb.dialect;
  const leftColumns = relationColumns(left);
  const rightColumns = relationColumns(right);

  const indexed = (source: RelationExpr, columns: readonly FlatColumn[]): SQL =>
    sql`SELECT ${aliased(dialect, rowIndex(), ZIP_INDEX)}, ${projectColumns(dialect, "t", columns)} FROM ${subquerySource(source, "t")}`;

  const outputs = commaList([
    ...leftColumns.map((column) =>
      aliased(dialect, qualified(dialect, "a", column.name), `a_${column.name}`),
    ),
    ...rightColumns.map((column) =>
      aliased(dialect, qualified(dialect, "b", column.name), `b_${column.name}`),
    ),
  ]);
  const a = sql`(${indexed(left, leftColumns)}) AS a`;
  const b = sql`(${indexed(right, rightColumns)}) AS b`;
  const on = sql`${qualified(dialect, "a", ZIP_INDEX)} = ${qualified(dialect, "b", ZIP_INDEX)}`;
  const type = relationType({
    a: structType(left.type.columns),
    b: structType(right.type.columns),
  });

  const join = (operator: string): SQL =>
    sql`SELECT ${outputs} FROM ${a} ${sql.raw(operator)} ${b} ON ${on}`;

  switch (kind) {
    case "inner": {
      return relation(type, join("JOIN"));
    }
    case "left": {
      return relation(type, join("LEFT JOIN"));
    }
    case "full": {
      if (dialect.capabilities.supportsFullOuterJoin) {
        return relation(type, join("FULL OUTER JOIN"));
      }
      // unmatched right rows are the RIGHT JOIN rows with no left index
      const unmatchedRight = sql`${join("RIGHT JOIN")} WHERE ${qualified(dialect, "a", ZIP_INDEX)} IS NULL`;
      return relation(
        type,
        sql`${join("LEFT JOIN")} UNION ALL ${unmatchedRight}`,
      );
    }
  }
}

export function createRelationalFunctions(qb: QueryBuilder) {
  const dialect = qb.dialect;

  return {
    limit(table: Collection, n: number): RelationExpr {
      return qb.limit(qb.toRelation(table), requireInteger("n", n, 0));
    },

    limitOffset(
      table: Collection,
      limit: number,
      offset: number,
    ): RelationExpr {
      return qb.limit(
        qb.toRelation(table),
        requireInteger("limit", limit, 0),
        requireInteger("offset", offset, 0),
      );
    },

    /**
     * Rows `[index * pageSize, (index + 1) * pageSize)`.
     */
    page(
      table: Collection,
      index: number,
      pageSize: number = DEFAULT_PAGE_SIZE,
    ): RelationExpr {
      requireInteger("index", index, 0);
      requireInteger("pageSize", pageSize, 1);
      return qb.limit(qb.toRelation(table), pageSize, index * pageSize);
    },

    /**
     * Prepends a 0-based `index` column.
     */
    enum(table: Collection): RelationExpr {
      const source = qb.toRelation(table);
      if ("index" in source.type.columns) {
        throw new QueryTypeError(`enum cannot add "index": the column exists`, {
          function: "enum",
        });
      }
      const columns = relationColumns(source);
      return relation(
        relationType({ index: T.int, ...source.type.columns }),
        sql`SELECT ${aliased(dialect, rowIndex(), "index")}, ${projectColumns(dialect, "t", columns)} FROM ${subquerySource(source, "t")}`,
      );
    },

    distinct(table: Collection): RelationExpr {
      const source = qb.toRelation(table);
      return relation(
        source.type,
        sql`SELECT DISTINCT ${projectColumns(dialect, "t", relationColumns(source))} FROM ${subquerySource(source, "t")}`,
      );
    },

    isEmpty(collection: Collection): ScalarExpr {
      return scalar(
        T.bool,
        sql`(NOT EXISTS (${qb.toRelation(collection).sql}))`,
      );
    },

    zipjoin(a: Collection, b: Collection): RelationExpr {
      return zipjoinRelations(qb, qb.toRelation(a), qb.toRelation(b), "inner");
    },

    zipjoinLeft(a: Collection, b: Collection): RelationExpr {
      return zipjoinRelations(qb, qb.toRelation(a), qb.toRelation(b), "left");
    },

    zipjoinLongest(a: Collection, b: Collection): RelationExpr {
      return zipjoinRelations(qb, qb.toRelation(a), qb.toRelation(b), "full");
    },
  };
}
