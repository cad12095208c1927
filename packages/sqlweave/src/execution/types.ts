import { type SQL } from "drizzle-orm";

export type CompiledSqlQuery = Readonly<{
  params: readonly unknown[];
  sql: string;
}>;

export type Row = Readonly<Record<string, unknown>>;

/**
 * Driver binding used by the executor.
 *
 * `execute` returns rows; `run` is for statements without a result set
 * (DDL, INSERT, transaction control).
 */
export type SqlExecutionAdapter = Readonly<{
  compile: (query: SQL) => CompiledSqlQuery;
  execute: (query: SQL) => Promise<readonly Row[]>;
  run: (query: SQL) => Promise<void>;
  close?: () => Promise<void>;
}>;

/**
 * Values returned by the executor after decoding driver output.
 */
export type ResultValue = string | number | boolean | Date | null;

export type ResultRow = Readonly<Record<string, ResultValue>>;

// ============================================================
// Observability Hooks
// ============================================================

export type ExecutorOperation =
  | "eval"
  | "count"
  | "materialize"
  | "release"
  | "begin"
  | "commit"
  | "rollback";

/**
 * Context passed to observability hooks.
 */
export type HookContext = Readonly<{
  /** Unique ID for this statement */
  operationId: string;
  operation: ExecutorOperation;
  /** Timestamp when the statement started */
  startedAt: Date;
}>;

/**
 * Query hook context with SQL information.
 */
export type QueryHookContext = HookContext &
  Readonly<{
    /** The SQL text sent to the driver */
    sql: string;
    /** Query parameters */
    params: readonly unknown[];
  }>;

export type SampleTopUpEvent = Readonly<{
  /** Rows requested */
  requested: number;
  /** Rows the random draw produced */
  drawn: number;
  /** Rows taken from the front of the table to reach `requested` */
  topUp: number;
}>;

/**
 * Observability hooks for monitoring executor activity.
 *
 * @example
 * ```typescript
 * const hooks: ExecutorHooks = {
 *   onQueryStart: (ctx) => {
 *     console.log(`[${ctx.operationId}] Query: ${ctx.sql}`);
 *   },
 *   onQueryEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] ${result.rowCount} rows in ${result.durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 * ```
 */
export type ExecutorHooks = Readonly<{
  /** Called before a statement is executed */
  onQueryStart?: (ctx: QueryHookContext) => void;
  /** Called after a statement completes successfully */
  onQueryEnd?: (
    ctx: QueryHookContext,
    result: Readonly<{ rowCount: number; durationMs: number }>,
  ) => void;
  /** Called when a statement fails or returns the wrong number of rows */
  onError?: (ctx: HookContext, error: Error) => void;
  /** Called when `sampleFast` completes a short draw from the table front */
  onSampleTopUp?: (event: SampleTopUpEvent) => void;
}>;
