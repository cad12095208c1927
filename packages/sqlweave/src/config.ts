/**
 * Process configuration, read from the environment.
 *
 * | variable | values | default |
 * |---|---|---|
 * | `SQLWEAVE_DB_TYPE` | `postgres`, `sqlite`, `duck`, `mysql` | `sqlite` |
 * | `SQLWEAVE_SAMPLE_BIAS` | number `>= 0` | `0.05` |
 *
 * Empty values fall back to the default.
 */
import { z } from "zod";

import { parseConfiguration } from "./errors/validation";
import { DEFAULT_SAMPLE_BIAS } from "./functions/sampling";
import { DEFAULT_DIALECT, SQL_DIALECTS, type SqlDialect } from "./query/dialect";
import { warnInDevelopment } from "./utils";

export type SqlWeaveConfig = Readonly<{
  dbType: SqlDialect;
  sampleBias: number;
}>;

/** An empty or blank variable counts as unset. */
function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const environmentSchema = z.object({
  SQLWEAVE_DB_TYPE: z.preprocess(
    blankAsUnset,
    z.string().trim().toLowerCase().pipe(z.enum(SQL_DIALECTS)).optional(),
  ),
  SQLWEAVE_SAMPLE_BIAS: z.preprocess(
    blankAsUnset,
    z.coerce.number().finite().nonnegative().optional(),
  ),
});

/**
 * Validates the environment.
 *
 * @throws ConfigurationError with the zod issues in `details.issues`
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): SqlWeaveConfig {
  const parsed = parseConfiguration(environmentSchema, env, "environment");

  if (parsed.SQLWEAVE_DB_TYPE === undefined) {
    warnInDevelopment(
      `[sqlweave] SQLWEAVE_DB_TYPE is not set; compiling for "${DEFAULT_DIALECT}".`,
    );
  }

  return Object.freeze({
    dbType: parsed.SQLWEAVE_DB_TYPE ?? DEFAULT_DIALECT,
    sampleBias: parsed.SQLWEAVE_SAMPLE_BIAS ?? DEFAULT_SAMPLE_BIAS,
  });
}
