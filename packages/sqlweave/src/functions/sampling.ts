/**
 * Random sampling.
 *
 * `sampleRatioFast` keeps each row with probability `ratio`, so its size
 * varies between runs. `sampleFast` returns exactly `n` rows: it draws
 * with a slightly inflated ratio, fixes the draw in a temporary table, and
 * tops up from the front of the table when the draw comes back short.
 */
import { sql } from "drizzle-orm";

import { type Collection, type RelationExpr, scalar } from "../core/expr";
import { T } from "../core/types";
import { QueryValueError } from "../errors";
import { type Executor } from "../execution/executor";
import { QueryBuilder } from "../query/builder";
import { requireInteger } from "./shared";

/**
 * Extra fraction drawn on the first pass, so that a short draw is rare.
 */
export const DEFAULT_SAMPLE_BIAS = 0.05;

/**
 * `SELECT cols FROM (table) AS t WHERE random() < ratio`
 *
 * @throws QueryValueError unless `ratio` is a finite number `>= 0`
 */
export function sampleRatioFast(
  qb: QueryBuilder,
  table: Collection,
  ratio: number,
): RelationExpr {
  if (!Number.isFinite(ratio) || ratio < 0) {
    throw new QueryValueError("ratio must be a non-negative number", {
      constraint: "ratio >= 0",
      value: ratio,
    });
  }
  const threshold = qb.literal(ratio, T.float);
  return qb.where(qb.toRelation(table), () =>
    scalar(T.bool, sql`${qb.dialect.random()} < ${threshold.sql}`),
  );
}

/**
 * Exactly `n` rows of `table`, mostly drawn at random.
 *
 * The first pass keeps rows with probability `(1 + bias) * n / count` and
 * takes at most `n` of them. If fewer than `n` come back, the shortfall is
 * taken from the front of `table`; rows already drawn may then appear
 * twice. When `n` equals the row count, `table` is returned unchanged.
 *
 * Runs at most three statements besides the materialization: the table
 * count, the draw, and the count of the draw.
 *
 * @throws QueryValueError when `n` is not a positive integer, `bias` is
 * negative, or `n` exceeds the row count
 */
export async function sampleFast(
  executor: Executor,
  table: Collection,
  n: number,
  bias: number = DEFAULT_SAMPLE_BIAS,
): Promise<RelationExpr> {
  requireInteger("n", n, 1);
  if (!Number.isFinite(bias) || bias < 0) {
    throw new QueryValueError("bias must be non-negative", {
      constraint: "bias >= 0",
      value: bias,
    });
  }

  const qb = new QueryBuilder(executor.dialect);
  const source = qb.toRelation(table);
  const total = await executor.count(source);
  if (n > total) {
    throw new QueryValueError(
      "n must not exceed the number of rows in the table",
      { constraint: "n <= count(table)", value: n },
    );
  }
  if (n === total) {
    return source;
  }

  const ratio = ((1 + bias) * n) / total;
  const drawn = await executor.materialize(
    qb.limit(sampleRatioFast(qb, source, ratio), n),
  );
  const drawnCount = await executor.count(drawn);
  if (drawnCount === n) {
    return drawn;
  }

  const topUp = n - drawnCount;
  executor.hooks.onSampleTopUp?.({ requested: n, drawn: drawnCount, topUp });
  return qb.unionAll(drawn, qb.limit(source, topUp));
}
