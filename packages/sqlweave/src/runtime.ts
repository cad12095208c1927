/**
 * The process-wide function surface.
 *
 * The dialect is resolved once, when the runtime is initialized, and the
 * surface built for it is frozen. Calling `initializeRuntime` again with
 * the same configuration returns the existing runtime; a call that omits
 * the executor keeps the one already bound.
 */
import { type SqlWeaveConfig, loadConfig } from "./config";
import { ConfigurationError } from "./errors";
import { type Executor } from "./execution/executor";
import { createQueryFunctions, type QueryFunctions } from "./functions";
import { type DialectAdapter, getDialect } from "./query/dialect";

export type Runtime = Readonly<{
  config: SqlWeaveConfig;
  dialect: DialectAdapter;
  functions: QueryFunctions;
  executor?: Executor;
}>;

export type RuntimeOptions = Readonly<{
  /** Defaults to `loadConfig()` */
  config?: SqlWeaveConfig;
  executor?: Executor;
}>;

let current: Runtime | undefined;

/**
 * @throws ConfigurationError when the configuration is invalid, or the
 * runtime was already initialized with another dialect, sample bias or
 * executor
 */
export function initializeRuntime(options: RuntimeOptions = {}): Runtime {
  const config = options.config ?? loadConfig();

  if (current !== undefined) {
    if (current.config.dbType !== config.dbType) {
      throw new ConfigurationError(
        `Runtime already initialized for "${current.config.dbType}", cannot switch to "${config.dbType}"`,
        { initialized: current.config.dbType, requested: config.dbType },
        { suggestion: `Initialize the runtime once at startup.` },
      );
    }
    if (current.config.sampleBias !== config.sampleBias) {
      throw new ConfigurationError(
        `Runtime already initialized with sample bias ${current.config.sampleBias}, cannot switch to ${config.sampleBias}`,
        {
          initialized: current.config.sampleBias,
          requested: config.sampleBias,
        },
        { suggestion: `Initialize the runtime once at startup.` },
      );
    }
    if (
      options.executor !== undefined &&
      options.executor !== current.executor
    ) {
      throw new ConfigurationError(
        "Runtime already initialized with another executor",
        { dbType: config.dbType },
        { suggestion: `Initialize the runtime once at startup.` },
      );
    }
    return current;
  }

  const dialect = getDialect(config.dbType);
  const functions = createQueryFunctions(dialect, {
    sampleBias: config.sampleBias,
    ...(options.executor === undefined ? {} : { executor: options.executor }),
  });
  current = Object.freeze({
    config,
    dialect,
    functions,
    ...(options.executor === undefined ? {} : { executor: options.executor }),
  });
  return current;
}

/**
 * @throws ConfigurationError before `initializeRuntime` has run
 */
export function getRuntime(): Runtime {
  if (current === undefined) {
    throw new ConfigurationError(
      "Runtime is not initialized",
      {},
      { suggestion: `Call initializeRuntime() at startup.` },
    );
  }
  return current;
}

/**
 * Forgets the current runtime. Intended for tests.
 */
export function resetRuntime(): void {
  current = undefined;
}
