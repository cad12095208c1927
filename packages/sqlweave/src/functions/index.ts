/**
 * The function surface, bound to one dialect.
 *
 * @example
 * ```typescript
 * const fns = createQueryFunctions(sqliteDialect, { executor });
 * const reachable = fns.bfs(edges, fns.qb.listOf([1]));
 * const rows = await executor.forceEval(reachable);
 * ```
 */
import { type Collection, type RelationExpr } from "../core/expr";
import { ConfigurationError } from "../errors";
import { type Executor } from "../execution/executor";
import { QueryBuilder } from "../query/builder";
import { type DialectAdapter } from "../query/dialect";
import { createAggregateFunctions } from "./aggregates";
import { createCastFunctions } from "./casts";
import { createGraphFunctions } from "./graph";
import { createRangeFunctions } from "./ranges";
import { createRelationalFunctions } from "./relational";
import {
  DEFAULT_SAMPLE_BIAS,
  sampleFast,
  sampleRatioFast,
} from "./sampling";
import { createScalarFunctions } from "./scalars";

export {
  type AggregateFunction,
  type AggregateKind,
  compileAggregate,
  compileCount,
} from "./aggregates";
export { type CastFunction, type CastTarget, convertPrimitive } from "./casts";
export {
  type FixedBound,
  type RangeBound,
  type RangeBoundInput,
  type SelectorBound,
  toRangeBound,
} from "./ranges";
export {
  DEFAULT_PAGE_SIZE,
  zipjoinRelations,
  type ZipJoinKind,
} from "./relational";
export { DEFAULT_SAMPLE_BIAS, sampleFast, sampleRatioFast } from "./sampling";
export type { VectorizedFunction } from "./scalars";
export type { Operand } from "./shared";

export type QueryFunctionsOptions = Readonly<{
  /** Executor used by `sampleFast` and transaction control */
  executor?: Executor;
  /** Default bias for `sampleFast` */
  sampleBias?: number;
}>;

export function createQueryFunctions(
  dialect: DialectAdapter,
  options: QueryFunctionsOptions = {},
) {
  const { executor } = options;
  if (executor !== undefined && executor.dialect.name !== dialect.name) {
    throw new ConfigurationError(
      `Executor runs ${executor.dialect.name} but the functions target ${dialect.name}`,
      { executor: executor.dialect.name, dialect: dialect.name },
    );
  }

  const qb = new QueryBuilder(dialect);
  const defaultBias = options.sampleBias ?? DEFAULT_SAMPLE_BIAS;

  function requireExecutor(operation: string): Executor {
    if (executor === undefined) {
      throw new ConfigurationError(
        `${operation} needs an executor`,
        { operation },
        {
          suggestion: `Pass { executor } to createQueryFunctions() or initializeRuntime().`,
        },
      );
    }
    return executor;
  }

  return Object.freeze({
    qb,
    dialect,
    ...createAggregateFunctions(qb),
    ...createScalarFunctions(qb),
    ...createRelationalFunctions(qb),
    ...createGraphFunctions(qb),
    ...createRangeFunctions(qb),
    ...createCastFunctions(qb),

    sampleRatioFast(table: Collection, ratio: number): RelationExpr {
      return sampleRatioFast(qb, table, ratio);
    },

    sampleFast(
      table: Collection,
      n: number,
      bias: number = defaultBias,
    ): Promise<RelationExpr> {
      return sampleFast(requireExecutor("sampleFast"), table, n, bias);
    },

    begin(): Promise<void> {
      return requireExecutor("begin").begin();
    },

    commit(): Promise<void> {
      return requireExecutor("commit").commit();
    },

    rollback(): Promise<void> {
      return requireExecutor("rollback").rollback();
    },
  });
}

export type QueryFunctions = ReturnType<typeof createQueryFunctions>;
