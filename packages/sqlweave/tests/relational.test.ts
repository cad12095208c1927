import { describe, expect, it } from "vitest";

import { T } from "../src/core/types";
import { QueryTypeError, QueryValueError } from "../src/errors";
import { createQueryFunctions } from "../src/functions";
import { mysqlDialect, postgresDialect } from "../src/query/dialect";
import { toSqlString, toSqlWithParams } from "./sql-test-utils";
import { columnValues, createTestContext, seedNumbers, sorted } from "./test-utils";

describe("limit and pagination", () => {
  it("limits a list", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(fns.limit(fns.qb.listOf([1, 2, 3]), 2));
    expect(columnValues(rows, "value")).toEqual([1, 2]);
  });

  it("skips rows with limitOffset", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(
      fns.limitOffset(fns.qb.listOf([1, 2, 3]), 1, 1),
    );
    expect(columnValues(rows, "value")).toEqual([2]);
  });

  it("returns pages of a table", async () => {
    const { executor, db, fns } = createTestContext();
    seedNumbers(db, [1, 2, 3, 4, 5, 6, 7]);
    const numbers = fns.qb.table("numbers", { n: T.int });
    const second = await executor.forceEval(fns.page(numbers, 1, 3));
    const last = await executor.forceEval(fns.page(numbers, 2, 3));
    const past = await executor.forceEval(fns.page(numbers, 5, 3));
    expect(columnValues(second, "n")).toEqual([4, 5, 6]);
    expect(columnValues(last, "n")).toEqual([7]);
    expect(past).toEqual([]);
  });

  it("uses a default page size of 20", () => {
    const fns = createQueryFunctions(postgresDialect);
    const numbers = fns.qb.table("numbers", { n: T.int });
    expect(toSqlString(fns.page(numbers, 0).sql, "postgres")).toBe(
      'SELECT t."n" FROM (SELECT "n" FROM "numbers") AS t LIMIT 20 OFFSET 0',
    );
  });

  it("validates its integers", () => {
    const fns = createQueryFunctions(postgresDialect);
    const values = fns.qb.listOf([1]);
    expect(() => fns.limit(values, -1)).toThrow(QueryValueError);
    expect(() => fns.limit(values, -1)).toThrow("n must be a non-negative integer");
    expect(() => fns.limitOffset(values, 1, -2)).toThrow(
      "offset must be a non-negative integer",
    );
    expect(() => fns.page(values, -1)).toThrow(
      "index must be a non-negative integer",
    );
    expect(() => fns.page(values, 0, 0)).toThrow(
      "pageSize must be a positive integer",
    );
  });
});

describe("enum", () => {
  it("numbers rows from zero", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(fns.enum(fns.qb.listOf(["a", "b", "c"])));
    expect(rows).toEqual([
      { index: 0, value: "a" },
      { index: 1, value: "b" },
      { index: 2, value: "c" },
    ]);
  });

  it("puts index first", () => {
    const fns = createQueryFunctions(postgresDialect);
    const numbered = fns.enum(fns.qb.table("numbers", { n: T.int }));
    expect(Object.keys(numbered.type.columns)).toEqual(["index", "n"]);
  });

  it("refuses to shadow an index column", () => {
    const fns = createQueryFunctions(postgresDialect);
    const indexed = fns.qb.table("pages", { index: T.int });
    expect(() => fns.enum(indexed)).toThrow(QueryTypeError);
  });
});

describe("distinct and isEmpty", () => {
  it("drops duplicate rows", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(fns.distinct(fns.qb.listOf([3, 1, 3, 1, 2])));
    expect(sorted(columnValues(rows, "value"))).toEqual([1, 2, 3]);
  });

  it("tests for emptiness", async () => {
    const { executor, fns } = createTestContext();
    expect(await executor.forceEval(fns.isEmpty(fns.qb.listOf([])))).toBe(true);
    expect(await executor.forceEval(fns.isEmpty(fns.qb.listOf([1])))).toBe(false);
  });
});

describe("zipjoin", () => {
  type Pair = Readonly<Record<string, unknown>>;

  const byLeft = (rows: readonly Pair[]): Pair[] =>
    [...rows].sort((a, b) => Number(a["a_value"] ?? 99) - Number(b["a_value"] ?? 99));

  it("pairs rows by position", async () => {
    const { executor, fns } = createTestContext();
    const zipped = fns.zipjoin(fns.qb.listOf([1, 2, 3]), fns.qb.listOf(["x", "y"]));
    expect(Object.keys(zipped.type.columns)).toEqual(["a", "b"]);
    expect(byLeft(await executor.forceEval(zipped))).toEqual([
      { a_value: 1, b_value: "x" },
      { a_value: 2, b_value: "y" },
    ]);
  });

  it("keeps unmatched left rows", async () => {
    const { executor, fns } = createTestContext();
    const zipped = fns.zipjoinLeft(fns.qb.listOf([1, 2, 3]), fns.qb.listOf(["x"]));
    expect(byLeft(await executor.forceEval(zipped))).toEqual([
      { a_value: 1, b_value: "x" },
      { a_value: 2, b_value: null },
      { a_value: 3, b_value: null },
    ]);
  });

  it("keeps unmatched rows on both sides", async () => {
    const { executor, fns } = createTestContext();
    const zipped = fns.zipjoinLongest(fns.qb.listOf([1]), fns.qb.listOf(["x", "y"]));
    expect(byLeft(await executor.forceEval(zipped))).toEqual([
      { a_value: 1, b_value: "x" },
      { a_value: null, b_value: "y" },
    ]);
  });

  it("uses FULL OUTER JOIN where the dialect has it", () => {
    const fns = createQueryFunctions(postgresDialect);
    const sql = toSqlString(
      fns.zipjoinLongest(fns.qb.listOf([1]), fns.qb.listOf([2])).sql,
      "postgres",
    );
    expect(sql).toContain(") AS a FULL OUTER JOIN (");
  });

  it("emulates the full join on mysql", () => {
    const fns = createQueryFunctions(mysqlDialect);
    const indexed =
      "SELECT (ROW_NUMBER() OVER () - 1) AS `zip_index`, t.`value` FROM (SELECT ? AS `value`) AS t";
    const join = (operator: string): string =>
      `SELECT a.\`value\` AS \`a_value\`, b.\`value\` AS \`b_value\` FROM (${indexed}) AS a ${operator} (${indexed}) AS b ON a.\`zip_index\` = b.\`zip_index\``;

    expect(
      toSqlWithParams(
        fns.zipjoinLongest(fns.qb.listOf([1]), fns.qb.listOf([2])).sql,
        "mysql",
      ),
    ).toEqual({
      sql: `${join("LEFT JOIN")} UNION ALL ${join("RIGHT JOIN")} WHERE a.\`zip_index\` IS NULL`,
      params: [1, 2, 1, 2],
    });
  });
});
