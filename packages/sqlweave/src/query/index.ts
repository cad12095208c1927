/**
 * Query module: the expression builder, dialect adapters and SQL helpers.
 */

export * from "./builder";
export * from "./dialect";
export {
  aliased,
  identifier,
  projectColumns,
  qualified,
  relationColumns,
  subquerySource,
} from "./sql-utils";
