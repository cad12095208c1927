/**
 * Value types carried by compiled expressions.
 *
 * A relation's columns keep their declaration order; a relation with a
 * single column is a "list relation" and can stand wherever a list is
 * accepted.
 */
import { QueryTypeError } from "../errors";

// ============================================================
// Primitive Types
// ============================================================

export type PrimitiveName =
  | "int"
  | "float"
  | "string"
  | "bool"
  | "datetime"
  | "null";

export type PrimitiveType = Readonly<{
  kind: "primitive";
  name: PrimitiveName;
}>;

// ============================================================
// Compound Types
// ============================================================

/**
 * A named group of columns, flattened into `<struct>_<field>` columns
 * when rendered.
 */
export type StructType = Readonly<{
  kind: "struct";
  fields: Readonly<Record<string, ColumnType>>;
}>;

export type ColumnType = PrimitiveType | StructType;

export type RelationType = Readonly<{
  kind: "relation";
  columns: Readonly<Record<string, ColumnType>>;
}>;

/**
 * An in-memory ordered sequence. Items may themselves be collections.
 */
export type ListType = Readonly<{
  kind: "list";
  item: ValueType;
}>;

export type ValueType = PrimitiveType | RelationType | ListType;

// ============================================================
// Constructors
// ============================================================

function primitive(name: PrimitiveName): PrimitiveType {
  const type: PrimitiveType = { kind: "primitive", name };
  return Object.freeze(type);
}

/**
 * Primitive type singletons.
 */
export const T = Object.freeze({
  int: primitive("int"),
  float: primitive("float"),
  string: primitive("string"),
  bool: primitive("bool"),
  datetime: primitive("datetime"),
  null: primitive("null"),
});

export function relationType(
  columns: Readonly<Record<string, ColumnType>>,
): RelationType {
  if (Object.keys(columns).length === 0) {
    throw new QueryTypeError("A relation needs at least one column");
  }
  const type: RelationType = {
    kind: "relation",
    columns: Object.freeze({ ...columns }),
  };
  return Object.freeze(type);
}

export function structType(
  fields: Readonly<Record<string, ColumnType>>,
): StructType {
  const type: StructType = { kind: "struct", fields: Object.freeze({ ...fields }) };
  return Object.freeze(type);
}

export function listType(item: ValueType): ListType {
  const type: ListType = { kind: "list", item };
  return Object.freeze(type);
}

// ============================================================
// Predicates
// ============================================================

export function isNumeric(type: ValueType | ColumnType): boolean {
  return type.kind === "primitive" && (type.name === "int" || type.name === "float");
}

export function isPrimitive(
  type: ValueType | ColumnType,
): type is PrimitiveType {
  return type.kind === "primitive";
}

/**
 * Returns the primitive element type of a one-column collection type,
 * descending through nested lists. Returns undefined when the type is a
 * scalar, has several columns, or bottoms out in a struct.
 *
 * @example
 * ```typescript
 * collectionElementType(listType(T.int)); // T.int
 * collectionElementType(listType(listType(T.float))); // T.float
 * collectionElementType(relationType({ a: T.int, b: T.int })); // undefined
 * ```
 */
export function collectionElementType(
  type: ValueType,
): PrimitiveType | undefined {
  switch (type.kind) {
    case "primitive": {
      return undefined;
    }
    case "relation": {
      const columns = Object.values(type.columns);
      const [only] = columns;
      if (columns.length !== 1 || only === undefined) return undefined;
      return only.kind === "primitive" ? only : undefined;
    }
    case "list": {
      return type.item.kind === "primitive" ?
          type.item
        : collectionElementType(type.item);
    }
  }
}

// ============================================================
// Flattening
// ============================================================

export type FlatColumn = Readonly<{
  /** Rendered column name (struct fields joined with "_") */
  name: string;
  type: PrimitiveType;
}>;

export function joinNames(parts: readonly string[]): string {
  return parts.join("_");
}

/**
 * Flattens struct columns into their rendered names.
 *
 * @example
 * ```typescript
 * flattenColumns({ a: structType({ value: T.int }), n: T.int });
 * // [{ name: "a_value", type: T.int }, { name: "n", type: T.int }]
 * ```
 */
export function flattenColumns(
  columns: Readonly<Record<string, ColumnType>>,
  prefix: readonly string[] = [],
): FlatColumn[] {
  const flat: FlatColumn[] = [];
  for (const [name, type] of Object.entries(columns)) {
    const path = [...prefix, name];
    if (type.kind === "struct") {
      flat.push(...flattenColumns(type.fields, path));
    } else {
      flat.push({ name: joinNames(path), type });
    }
  }
  return flat;
}

// ============================================================
// Formatting
// ============================================================

/**
 * Renders a type for error messages, e.g. `list[int]` or `table{a: int}`.
 */
export function formatType(type: ValueType | ColumnType): string {
  switch (type.kind) {
    case "primitive": {
      return type.name;
    }
    case "struct": {
      return `struct{${formatFields(type.fields)}}`;
    }
    case "relation": {
      return `table{${formatFields(type.columns)}}`;
    }
    case "list": {
      return `list[${formatType(type.item)}]`;
    }
  }
}

function formatFields(fields: Readonly<Record<string, ColumnType>>): string {
  return Object.entries(fields)
    .map(([name, type]) => `${name}: ${formatType(type)}`)
    .join(", ");
}
