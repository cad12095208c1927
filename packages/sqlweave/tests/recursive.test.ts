import { sql } from "drizzle-orm";
import { describe, expect, it } from "vitest";

import { T } from "../src/core/types";
import { CompilerInvariantError, QueryTypeError } from "../src/errors";
import { joinWorktable, QueryBuilder } from "../src/query/builder";
import { postgresDialect, sqliteDialect } from "../src/query/dialect";
import { toSqlString } from "./sql-test-utils";
import { columnValues, createTestContext, sorted } from "./test-utils";

const qb = new QueryBuilder(sqliteDialect);

/** 1, 2, 3, 1, ... : terminates only when revisits are dropped */
function cycle() {
  const handle = qb.beginRecursive({
    name: "nums",
    columns: { n: T.int },
    base: sql`SELECT 1`,
    semantics: "set",
  });
  handle.setRecursiveStep((self) => {
    const n = self.column("r", "n");
    return sql`SELECT (${n} % 3) + 1 FROM ${self.table} AS r`;
  });
  return qb.finalizeRecursive(handle);
}

/** Two starting rows, each counting up to 3 */
function twoCounters() {
  const handle = qb.beginRecursive({
    name: "nums",
    columns: { n: T.int },
    base: sql`SELECT 1 UNION ALL SELECT 1`,
    semantics: "multiset",
  });
  handle.setRecursiveStep((self) => {
    const n = self.column("r", "n");
    return sql`SELECT ${n} + 1 FROM ${self.table} AS r WHERE ${n} < 3`;
  });
  return qb.finalizeRecursive(handle);
}

describe("recursive queries", () => {
  it("closes the definition into a WITH RECURSIVE statement", () => {
    expect(toSqlString(cycle().sql)).toBe(
      'WITH RECURSIVE "nums"("n") AS (SELECT 1 UNION SELECT (r."n" % 3) + 1 FROM "nums" AS r) SELECT "nums"."n" FROM "nums"',
    );
  });

  it("uses UNION ALL for multiset semantics", () => {
    expect(toSqlString(twoCounters().sql)).toBe(
      'WITH RECURSIVE "nums"("n") AS (SELECT 1 UNION ALL SELECT 1 UNION ALL SELECT r."n" + 1 FROM "nums" AS r WHERE r."n" < 3) SELECT "nums"."n" FROM "nums"',
    );
  });

  it("types the result from the declared columns", () => {
    expect(cycle().type.columns).toEqual({ n: T.int });
  });

  it("reaches a fixed point on a cycle under set semantics", async () => {
    const { executor } = createTestContext();
    const rows = await executor.forceEval(cycle());
    expect(sorted(columnValues(rows, "n"))).toEqual([1, 2, 3]);
  });

  it("keeps duplicates under multiset semantics", async () => {
    const { executor } = createTestContext();
    const rows = await executor.forceEval(twoCounters());
    expect(sorted(columnValues(rows, "n"))).toEqual([1, 1, 2, 2, 3, 3]);
  });

  it("refuses to finalize without a recursive step", () => {
    const handle = qb.beginRecursive({
      name: "walk",
      columns: { id: T.int },
      base: sql`SELECT 1`,
      semantics: "set",
    });
    expect(() => qb.finalizeRecursive(handle)).toThrow(CompilerInvariantError);
    expect(() => qb.finalizeRecursive(handle)).toThrow(
      'Recursive query "walk" was finalized without a recursive step',
    );
  });

  it("binds the recursive step once", () => {
    const handle = qb.beginRecursive({
      name: "walk",
      columns: { id: T.int },
      base: sql`SELECT 1`,
      semantics: "set",
    });
    handle.setRecursiveStep((self) => sql`SELECT 1 FROM ${self.table}`);
    expect(() =>
      handle.setRecursiveStep((self) => sql`SELECT 2 FROM ${self.table}`),
    ).toThrow('Recursive step for "walk" is already set');
  });

  it("casts the base term where it fixes the column types", () => {
    const pg = new QueryBuilder(postgresDialect);
    const handle = pg.beginRecursive({
      name: "nums",
      columns: { n: T.int },
      base: sql`SELECT 1`,
      semantics: "multiset",
    });
    handle.setRecursiveStep((self) => {
      const n = self.column("r", "n");
      return sql`SELECT ${self.cast("n", sql`${n} + 1`)} FROM ${self.table} AS r WHERE ${n} < 3`;
    });
    expect(toSqlString(pg.finalizeRecursive(handle).sql, "postgres")).toBe(
      'WITH RECURSIVE "nums"("n") AS (SELECT CAST(b."n" AS BIGINT) FROM (SELECT 1) AS b("n") UNION ALL SELECT CAST(r."n" + 1 AS BIGINT) FROM "nums" AS r WHERE r."n" < 3) SELECT "nums"."n" FROM "nums"',
    );
  });

  it("rejects a cast to an undeclared column", () => {
    const handle = qb.beginRecursive({
      name: "walk",
      columns: { id: T.int },
      base: sql`SELECT 1`,
      semantics: "set",
    });
    expect(() => handle.self.cast("rank", sql`1`)).toThrow(CompilerInvariantError);
    expect(() => handle.self.cast("rank", sql`1`)).toThrow(
      'Recursive query "walk" has no column "rank"',
    );
  });

  it("validates the CTE and column names", () => {
    expect(() =>
      qb.beginRecursive({
        name: "bad-name",
        columns: { id: T.int },
        base: sql`SELECT 1`,
        semantics: "set",
      }),
    ).toThrow(QueryTypeError);
  });
});

describe("joinWorktable", () => {
  const handle = qb.beginRecursive({
    name: "reach",
    columns: { id: T.int },
    base: sql`SELECT 1`,
    semantics: "set",
  });
  const on = sql.raw('e."src" = r."id"');
  const source = sql.raw('SELECT "src", "dst" FROM "edges"');

  it("puts the worktable first and cross joins on sqlite", () => {
    expect(
      toSqlString(joinWorktable(sqliteDialect, handle.self, "r", source, "e", on)),
    ).toBe(
      '"reach" AS r CROSS JOIN (SELECT "src", "dst" FROM "edges") AS e WHERE e."src" = r."id"',
    );
  });

  it("uses an inner join elsewhere", () => {
    expect(
      toSqlString(
        joinWorktable(postgresDialect, handle.self, "r", source, "e", on),
        "postgres",
      ),
    ).toBe('"reach" AS r JOIN (SELECT "src", "dst" FROM "edges") AS e ON e."src" = r."id"');
  });
});
