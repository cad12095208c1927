/**
 * Validation for names that reach SQL text unparameterized.
 */

import { QueryTypeError } from "../../errors";

/**
 * Pattern for valid SQL identifiers.
 * Must start with letter or underscore, followed by letters, digits, or underscores.
 * Max 63 characters (PostgreSQL limit).
 */
const SQL_IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]{0,62}$/;

/**
 * Prefix of temporary tables created by the executor.
 */
export const INTERNAL_TABLE_PREFIX = "sqlweave_tmp_";

/**
 * Validates a table or column name supplied by the caller.
 *
 * Names are always quoted when rendered, so reserved words such as `rank`
 * are accepted.
 *
 * @throws QueryTypeError if the name is not a valid SQL identifier
 */
export function validateSqlIdentifier(
  name: string,
  role: "table" | "column" = "column",
): void {
  if (!SQL_IDENTIFIER_PATTERN.test(name)) {
    throw new QueryTypeError(
      `Invalid ${role} name "${name}": must start with a letter or underscore, ` +
        `contain only letters, digits, and underscores, and be at most 63 characters`,
      { name, role },
      {
        suggestion: `Use a simple identifier like "edges", "src", or "node_id".`,
      },
    );
  }
}
