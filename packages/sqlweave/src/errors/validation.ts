/**
 * Schema validation with errors in the SQLWeave hierarchy.
 */
import { type z, type ZodError, type ZodTypeAny } from "zod";

import { ConfigurationError } from "./index";

// ============================================================
// Types
// ============================================================

/**
 * A single validation failure.
 */
export type ValidationIssue = Readonly<{
  /** Dotted path to the failing field, empty for the root */
  path: string;
  message: string;
  /** Zod issue code */
  code: string;
}>;

// ============================================================
// Validation Functions
// ============================================================

/**
 * Converts Zod issues to ValidationIssue format.
 */
export function zodIssuesToValidationIssues(
  error: ZodError,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parses configuration input.
 *
 * @param source - What is being parsed, for the error message
 * @throws ConfigurationError with `details.issues` if validation fails
 *
 * @example
 * ```typescript
 * const env = parseConfiguration(envSchema, process.env, "environment");
 * ```
 */
export function parseConfiguration<TSchema extends ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  source: string,
): z.output<TSchema> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);
  throw new ConfigurationError(
    `Invalid ${source}: ${formatIssues(issues)}`,
    { source, issues },
    {
      cause: result.error,
      suggestion: `Check the following fields: ${issues.map((issue) => issue.path || "(root)").join(", ")}. See error.details.issues for specific validation failures.`,
    },
  );
}
