import { describe, expect, it } from "vitest";

import { type ScalarExpr } from "../src/core/expr";
import { QueryTypeError, QueryValueError } from "../src/errors";
import { createQueryFunctions } from "../src/functions";
import { postgresDialect } from "../src/query/dialect";
import { columnValues, createTestContext } from "./test-utils";

type Pair = Readonly<{ item: number; value: number }>;

function pairs(rows: readonly Readonly<Record<string, unknown>>[]): Pair[] {
  const items = columnValues(rows, "item");
  const values = columnValues(rows, "value");
  return items
    .map((item, index) => ({ item, value: values[index] ?? -1 }))
    .sort((a, b) => a.item - b.item || a.value - b.value);
}

describe("range", () => {
  it("counts from start up to end", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(fns.range(0, 4));
    expect(columnValues(rows, "value")).toEqual([0, 1, 2, 3]);
  });

  it("is empty when start is not below end", async () => {
    const { executor, fns } = createTestContext();
    expect(await executor.forceEval(fns.range(3, 3))).toEqual([]);
    expect(await executor.forceEval(fns.range(5, 2))).toEqual([]);
  });

  it("accepts scalar bounds", async () => {
    const { executor, fns } = createTestContext();
    const end = fns.length("abc");
    const rows = await executor.forceEval(fns.range(1, end));
    expect(columnValues(rows, "value")).toEqual([1, 2]);
  });

  it("requires int bounds", () => {
    const fns = createQueryFunctions(postgresDialect);
    expect(() => fns.range("a", 2)).toThrow(QueryTypeError);
    expect(() => fns.range(0, 2.5)).toThrow("range expects int, got float");
  });
});

describe("charRange", () => {
  it("includes both ends", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(fns.charRange("a", "d"));
    expect(rows.map((row) => row["value"])).toEqual(["a", "b", "c", "d"]);
  });

  it("requires string bounds", () => {
    const fns = createQueryFunctions(postgresDialect);
    expect(() => fns.charRange(1, "d")).toThrow(
      "charRange expects string, got int",
    );
  });
});

describe("mapRange", () => {
  it("ends each item's range at a selector, inclusive", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(
      fns.mapRange(fns.qb.listOf([1, 5]), 0, (item) => item),
    );
    expect(pairs(rows)).toEqual([
      { item: 1, value: 0 },
      { item: 1, value: 1 },
      { item: 5, value: 0 },
      { item: 5, value: 1 },
      { item: 5, value: 2 },
      { item: 5, value: 3 },
      { item: 5, value: 4 },
      { item: 5, value: 5 },
    ]);
  });

  it("starts each item's range at a selector", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(
      fns.mapRange(fns.qb.listOf([2, 4]), (item) => item, 5),
    );
    expect(pairs(rows)).toEqual([
      { item: 2, value: 2 },
      { item: 2, value: 3 },
      { item: 2, value: 4 },
      { item: 4, value: 4 },
    ]);
  });

  it("shares fixed bounds, end exclusive", async () => {
    const { executor, fns } = createTestContext();
    const rows = await executor.forceEval(
      fns.mapRange(fns.qb.listOf([7, 8]), { kind: "fixed", value: 1 }, 3),
    );
    expect(pairs(rows)).toEqual([
      { item: 7, value: 1 },
      { item: 7, value: 2 },
      { item: 8, value: 1 },
      { item: 8, value: 2 },
    ]);
  });

  it("requires int selectors", () => {
    const fns = createQueryFunctions(postgresDialect);
    const asText = (): ScalarExpr => fns.upper(fns.qb.literal("x"));
    expect(() => fns.mapRange(fns.qb.listOf([1]), 0, asText)).toThrow(
      "mapRange expects int, got string",
    );
  });

  it("requires integer fixed bounds", () => {
    const fns = createQueryFunctions(postgresDialect);
    const items = fns.qb.listOf([1]);
    expect(() => fns.mapRange(items, 0.5, 3)).toThrow(QueryValueError);
    expect(() => fns.mapRange(items, 0.5, 3)).toThrow(
      "mapRange start must be an integer",
    );
    expect(() =>
      fns.mapRange(items, 0, { kind: "fixed", value: Number.NaN }),
    ).toThrow("mapRange end must be an integer");
  });
});

describe("listMedian", () => {
  it("takes the middle of an odd count", async () => {
    const { executor, fns } = createTestContext();
    expect(await executor.forceEval(fns.listMedian(fns.qb.listOf([3, 1, 2])))).toBe(2);
  });

  it("averages the middle two of an even count", async () => {
    const { executor, fns } = createTestContext();
    expect(
      await executor.forceEval(fns.listMedian(fns.qb.listOf([4, 1, 3, 2]))),
    ).toBe(2.5);
  });

  it("is null for an empty list", async () => {
    const { executor, fns } = createTestContext();
    expect(await executor.forceEval(fns.listMedian(fns.qb.listOf([])))).toBeNull();
  });

  it("requires numbers", () => {
    const fns = createQueryFunctions(postgresDialect);
    expect(() => fns.listMedian(fns.qb.listOf(["a"]))).toThrow(
      "listMedian expects float, got string",
    );
  });
});
