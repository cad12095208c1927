/**
 * SQLWeave compiles aggregates, graph traversals, sampling and pagination
 * into SQL for PostgreSQL, SQLite, DuckDB and MySQL.
 *
 * @example
 * ```typescript
 * import { createQueryFunctions, sqliteDialect, T } from "sqlweave";
 * import { createLocalSqliteExecutor } from "sqlweave/sqlite";
 *
 * const { executor } = createLocalSqliteExecutor();
 * const fns = createQueryFunctions(sqliteDialect, { executor });
 *
 * const edges = fns.qb.table("edges", { src: T.int, dst: T.int });
 * const reachable = fns.bfs(edges, fns.qb.listOf([1]));
 * const rows = await executor.forceEval(reachable);
 * ```
 */

// ============================================================
// Types & Expressions
// ============================================================

export * from "./core";

// ============================================================
// Query Building
// ============================================================

export * from "./query";

// ============================================================
// Functions
// ============================================================

export {
  type AggregateFunction,
  type AggregateKind,
  compileAggregate,
  compileCount,
  type CastFunction,
  type CastTarget,
  convertPrimitive,
  createQueryFunctions,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SAMPLE_BIAS,
  type FixedBound,
  type Operand,
  type QueryFunctions,
  type QueryFunctionsOptions,
  type RangeBound,
  type RangeBoundInput,
  sampleFast,
  sampleRatioFast,
  type SelectorBound,
  toRangeBound,
  type VectorizedFunction,
  type ZipJoinKind,
  zipjoinRelations,
} from "./functions";

// ============================================================
// Execution
// ============================================================

export {
  decodeValue,
  type EvalResult,
  Executor,
  type ExecutorOptions,
} from "./execution/executor";
export type {
  CompiledSqlQuery,
  ExecutorHooks,
  ExecutorOperation,
  HookContext,
  QueryHookContext,
  ResultRow,
  ResultValue,
  Row,
  SampleTopUpEvent,
  SqlExecutionAdapter,
} from "./execution/types";

// ============================================================
// Configuration & Runtime
// ============================================================

export { loadConfig, type SqlWeaveConfig } from "./config";
export {
  getRuntime,
  initializeRuntime,
  resetRuntime,
  type Runtime,
  type RuntimeOptions,
} from "./runtime";

// ============================================================
// Errors
// ============================================================

export {
  CardinalityError,
  CompilerInvariantError,
  ConfigurationError,
  DatabaseOperationError,
  type ErrorCategory,
  getErrorSuggestion,
  isConstraintError,
  isSqlWeaveError,
  isSystemError,
  isUserRecoverable,
  QueryTypeError,
  QueryValueError,
  SqlWeaveError,
  type SqlWeaveErrorOptions,
  UnsupportedOperationError,
} from "./errors";
export {
  parseConfiguration,
  type ValidationIssue,
} from "./errors/validation";
