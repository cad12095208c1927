/**
 * Runs compiled queries on PGlite, an in-process PostgreSQL build, so the
 * column typing rules of a real Postgres engine apply.
 */
import { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { listType, T } from "../src/core/types";
import { Executor } from "../src/execution/executor";
import { createQueryFunctions, type QueryFunctions } from "../src/functions";
import { postgresDialect } from "../src/query/dialect";
import { columnValues, sorted } from "./test-utils";

const BIG = 3_000_000_000;

function createPgliteExecutor(client: PGlite, db: PgliteDatabase): Executor {
  const compiler = new PgDialect();
  return new Executor({
    dialect: postgresDialect,
    adapter: {
      compile: (query) => compiler.sqlToQuery(query),
      async execute(query) {
        const result = await db.execute(query);
        return result.rows;
      },
      async run(query) {
        await db.execute(query);
      },
      close: () => client.close(),
    },
  });
}

describe("postgres engine", () => {
  let db: PgliteDatabase;
  let executor: Executor;
  let fns: QueryFunctions;

  beforeAll(async () => {
    const client = new PGlite();
    db = drizzle(client);
    executor = createPgliteExecutor(client, db);
    fns = createQueryFunctions(postgresDialect, { executor });

    await db.execute(sql`CREATE TABLE edges (src BIGINT NOT NULL, dst BIGINT NOT NULL)`);
    await db.execute(
      sql`INSERT INTO edges (src, dst) VALUES (1, 2), (2, 3), (3, 1), (4, 5), (${BIG}, ${BIG + 1}), (${BIG + 1}, 1)`,
    );
    await db.execute(sql`CREATE TABLE numbers (n BIGINT NOT NULL)`);
    await db.execute(
      sql`INSERT INTO numbers (n) SELECT g FROM generate_series(1, 10) AS g`,
    );
  }, 60_000);

  afterAll(async () => {
    await executor.close();
  });

  async function temporaryTableCount(): Promise<number> {
    const result = await db.execute(
      sql`SELECT COUNT(*) AS count FROM pg_tables WHERE schemaname LIKE 'pg_temp%'`,
    );
    return Number(result.rows[0]?.["count"]);
  }

  describe("int columns", () => {
    it("binds literals beyond 32 bits", async () => {
      expect(await executor.forceEval(fns.qb.literal(BIG))).toBe(BIG);
      expect(await executor.forceEval(fns.sum(fns.qb.listOf([BIG, BIG])))).toBe(
        2 * BIG,
      );
    });

    it("traverses BIGINT edges with bfs", async () => {
      const edges = fns.qb.table("edges", { src: T.int, dst: T.int });
      const reached = await executor.forceEval(fns.bfs(edges, fns.qb.listOf([BIG])));
      expect(sorted(columnValues(reached, "id"))).toEqual([1, 2, 3, BIG, BIG + 1]);
    });

    it("walks BIGINT edges with ranks", async () => {
      const edges = fns.qb.table("edges", { src: T.int, dst: T.int });
      const rows = await executor.forceEval(fns.walkTree(edges, fns.qb.listOf([BIG]), 2));
      expect(
        [...rows].sort((a, b) => Number(a["rank"]) - Number(b["rank"])),
      ).toEqual([
        { id: BIG, rank: 0 },
        { id: BIG + 1, rank: 1 },
        { id: 1, rank: 2 },
      ]);
    });

    it("counts with a range", async () => {
      const rows = await executor.forceEval(fns.range(BIG, BIG + 3));
      expect(columnValues(rows, "value")).toEqual([BIG, BIG + 1, BIG + 2]);
    });
  });

  describe("32-bit function arguments", () => {
    it("narrows CHR, REPEAT and ROUND arguments", async () => {
      expect(await executor.forceEval(fns.char(65))).toBe("A");
      expect(await executor.forceEval(fns.repeat("ab", 3))).toBe("ababab");
      expect(await executor.forceEval(fns.round(2.345, 2))).toBe(2.35);
    });
  });

  describe("cast", () => {
    it("converts booleans and numbers", async () => {
      expect(await executor.forceEval(fns.cast(true, T.float))).toBe(1);
      expect(await executor.forceEval(fns.cast(BIG, T.string))).toBe("3000000000");
    });

    it("converts list elements", async () => {
      const values = fns.cast(fns.qb.listOf([1, 2], T.int), listType(T.float));
      expect(columnValues(await executor.forceEval(values), "value")).toEqual([1, 2]);
    });
  });

  describe("sampleFast", () => {
    it("draws from a BIGINT table and releases the draw", async () => {
      const numbers = fns.qb.table("numbers", { n: T.int });
      const sample = await fns.sampleFast(numbers, 4);
      const values = columnValues(await executor.forceEval(sample), "n");

      expect(values).toHaveLength(4);
      for (const value of values) {
        expect(value).toBeGreaterThanOrEqual(1);
        expect(value).toBeLessThanOrEqual(10);
      }
      expect(await temporaryTableCount()).toBe(1);
      expect(await executor.releaseTemporaryTables()).toBe(1);
      expect(await temporaryTableCount()).toBe(0);
    });
  });
});
