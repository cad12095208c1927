export {
  aggregate,
  type AggregateExpr,
  type Cardinality,
  type Collection,
  describeExpr,
  type Expr,
  type Extraction,
  isCollection,
  list,
  type ListExpr,
  relation,
  type RelationExpr,
  scalar,
  type ScalarExpr,
  typeOfExpr,
} from "./expr";
export {
  collectionElementType,
  type ColumnType,
  type FlatColumn,
  flattenColumns,
  formatType,
  isNumeric,
  isPrimitive,
  listType,
  type ListType,
  type PrimitiveName,
  type PrimitiveType,
  relationType,
  type RelationType,
  structType,
  type StructType,
  T,
  type ValueType,
} from "./types";
