/**
 * Query Builder Module
 *
 * Re-exports from the builder submodules for clean imports.
 */

export {
  type GroupRow,
  inferLiteralType,
  LIST_COLUMN,
  QueryBuilder,
  type RowRef,
} from "./query-builder";
export {
  beginRecursive,
  finalizeRecursive,
  joinWorktable,
  type RecursiveDefinition,
  type RecursiveQueryHandle,
  type RecursiveReference,
  type RecursiveSemantics,
} from "./recursive";
export { INTERNAL_TABLE_PREFIX, validateSqlIdentifier } from "./validation";
