/**
 * Graph traversal over an edge table with `src` and `dst` columns.
 *
 * Both traversals compile to a recursive CTE whose step joins the
 * worktable to the edges. `bfs` accumulates a set and needs no depth
 * bound: UNION drops rows already reached, so cycles reach a fixed point.
 * `walkTree` accumulates a multiset of `(id, rank)` rows and must be
 * bounded by `maxRank`, since UNION ALL keeps following cycles.
 */
import { type SQL, sql } from "drizzle-orm";

import { type Collection, type RelationExpr } from "../core/expr";
import { formatType, T } from "../core/types";
import { QueryTypeError } from "../errors";
import { joinWorktable, type QueryBuilder } from "../query/builder";
import { qualified, subquerySource } from "../query/sql-utils";
import { requireInteger } from "./shared";

const EDGE_COLUMNS = ["src", "dst"] as const;

/**
 * @throws QueryTypeError unless `edges` has int columns `src` and `dst`
 */
function validateEdges(label: string, edges: RelationExpr): void {
  const present = EDGE_COLUMNS.filter((name) => name in edges.type.columns);
  if (present.length !== EDGE_COLUMNS.length) {
    throw new QueryTypeError(
      `${label} expects an edges table with columns "src" and "dst", got ${formatType(edges.type)}`,
      { function: label, columns: Object.keys(edges.type.columns) },
    );
  }
  for (const name of EDGE_COLUMNS) {
    const type = edges.type.columns[name];
    if (type === undefined || type.kind !== "primitive" || type.name !== "int") {
      throw new QueryTypeError(`${label} expects edge column "${name}" to be int`, {
        function: label,
        column: name,
      });
    }
  }
}

/**
 * `SELECT t."<col>" FROM (initial) AS t`, checking the column is int.
 */
function initialNodes(
  qb: QueryBuilder,
  label: string,
  initial: Collection,
): Readonly<{ source: RelationExpr; id: SQL }> {
  const source = qb.toRelation(initial);
  const column = qb.soleColumn(source);
  if (column.type.name !== "int" && column.type.name !== "null") {
    throw new QueryTypeError(
      `${label} expects int node ids, got ${column.type.name}`,
      { function: label },
    );
  }
  return { source, id: qualified(qb.dialect, "t", column.name) };
}

export function createGraphFunctions(qb: QueryBuilder) {
  const dialect = qb.dialect;

  return {
    /**
     * Every node reachable from `initial`, including `initial` itself.
     * Each id appears once.
     *
     * @example
     * ```typescript
     * const edges = qb.table("edges", { src: T.int, dst: T.int });
     * const reachable = fns.bfs(edges, qb.listOf([1]));
     * // WITH RECURSIVE "bfs"("id") AS (... UNION SELECT e."dst" ...)
     * ```
     */
    bfs(edges: RelationExpr, initial: Collection): RelationExpr {
      validateEdges("bfs", edges);
      const start = initialNodes(qb, "bfs", initial);

      const handle = qb.beginRecursive({
        name: "bfs",
        columns: { id: T.int },
        base: sql`SELECT ${start.id} FROM ${subquerySource(start.source, "t")}`,
        semantics: "set",
      });
      handle.setRecursiveStep(
        (self) =>
          sql`SELECT ${self.cast("id", qualified(dialect, "e", "dst"))} FROM ${joinWorktable(
            dialect,
            self,
            "r",
            edges.sql,
            "e",
            sql`${qualified(dialect, "e", "src")} = ${self.column("r", "id")}`,
          )}`,
      );
      return qb.finalizeRecursive(handle);
    },

    /**
     * `(id, rank)` for every walk of at most `maxRank` edges from
     * `initial`. Not deduplicated: a node reached by several walks of the
     * same length appears once per walk.
     *
     * @throws QueryValueError unless `maxRank` is a non-negative integer
     */
    walkTree(
      edges: RelationExpr,
      initial: Collection,
      maxRank: number,
    ): RelationExpr {
      requireInteger("maxRank", maxRank, 0);
      validateEdges("walkTree", edges);
      const start = initialNodes(qb, "walkTree", initial);

      const handle = qb.beginRecursive({
        name: "walk_tree",
        columns: { id: T.int, rank: T.int },
        base: sql`SELECT ${start.id}, 0 FROM ${subquerySource(start.source, "t")}`,
        semantics: "multiset",
      });
      handle.setRecursiveStep((self) => {
        const rank = self.column("r", "rank");
        const on = sql`${qualified(dialect, "e", "src")} = ${self.column("r", "id")} AND ${rank} < ${sql.raw(String(maxRank))}`;
        return sql`SELECT ${self.cast("id", qualified(dialect, "e", "dst"))}, ${self.cast("rank", sql`${rank} + 1`)} FROM ${joinWorktable(
          dialect,
          self,
          "r",
          edges.sql,
          "e",
          on,
        )}`;
      });
      return qb.finalizeRecursive(handle);
    },
  };
}
