/**
 * QueryBuilder - typed expression construction over drizzle `sql` templates.
 *
 * A builder is bound to one dialect. Every method is pure and returns a
 * frozen expression node; nothing touches the database.
 */
import { type SQL, sql } from "drizzle-orm";

import {
  type AggregateExpr,
  aggregate,
  type Collection,
  describeExpr,
  list,
  type ListExpr,
  relation,
  type RelationExpr,
  scalar,
  type ScalarExpr,
} from "../../core/expr";
import {
  type ColumnType,
  type FlatColumn,
  flattenColumns,
  formatType,
  type PrimitiveType,
  relationType,
  type RelationType,
  T,
} from "../../core/types";
import { QueryTypeError, QueryValueError } from "../../errors";
import { type DialectAdapter, type LiteralValue } from "../dialect";
import { commaList } from "../dialect/common";
import {
  aliased,
  identifier,
  isNonNegativeInteger,
  projectColumns,
  qualified,
  relationColumns,
  subquerySource,
} from "../sql-utils";
import {
  beginRecursive,
  finalizeRecursive,
  type RecursiveDefinition,
  type RecursiveQueryHandle,
} from "./recursive";
import { validateSqlIdentifier } from "./validation";

/**
 * Column name of the relation a list renders to.
 */
export const LIST_COLUMN = "value";

/**
 * Alias of the single source in SELECTs built here.
 */
const ROW_ALIAS = "t";

// ============================================================
// Row Accessors
// ============================================================

/**
 * Typed access to the columns of the row being projected or filtered.
 */
export type RowRef = Readonly<{
  alias: string;
  type: RelationType;
  columns: readonly FlatColumn[];
  column: (name: string) => ScalarExpr;
}>;

/**
 * Column access inside GROUP BY: keys stay scalar, other columns become
 * aggregate inputs.
 */
export type GroupRow = Readonly<{
  key: (name: string) => ScalarExpr;
  column: (name: string) => AggregateExpr;
}>;

/**
 * Infers the primitive type of a JavaScript literal.
 */
export function inferLiteralType(value: LiteralValue): PrimitiveType {
  if (value === null) return T.null;
  if (typeof value === "boolean") return T.bool;
  if (typeof value === "number") {
    return Number.isInteger(value) ? T.int : T.float;
  }
  if (typeof value === "string") return T.string;
  return T.datetime;
}

function findColumn(columns: readonly FlatColumn[], name: string): FlatColumn {
  const column = columns.find((candidate) => candidate.name === name);
  if (column === undefined) {
    throw new QueryTypeError(`Unknown column "${name}"`, {
      column: name,
      available: columns.map((candidate) => candidate.name),
    });
  }
  return column;
}

// ============================================================
// QueryBuilder
// ============================================================

export class QueryBuilder {
  readonly #dialect: DialectAdapter;

  constructor(dialect: DialectAdapter) {
    this.#dialect = dialect;
  }

  get dialect(): DialectAdapter {
    return this.#dialect;
  }

  // ============================================================
  // Leaves
  // ============================================================

  /**
   * A bound literal value.
   *
   * @example
   * ```typescript
   * qb.literal(3); // int
   * qb.literal(3, T.float); // float
   * ```
   */
  literal(value: LiteralValue, type?: PrimitiveType): ScalarExpr {
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new QueryValueError("Numeric literals must be finite", {
        constraint: "finite",
        value,
      });
    }
    const resolved = type ?? inferLiteralType(value);
    return scalar(resolved, this.#dialect.literal(value, resolved));
  }

  /**
   * An in-memory list of literals, all bound with the widest item type.
   */
  listOf(values: readonly LiteralValue[], itemType?: PrimitiveType): ListExpr {
    // `list` checks every value against the item type and widens int to float
    const checked = list(
      values.map((value) => this.literal(value)),
      itemType,
    );
    const resolved = checked.type.item;
    if (resolved.kind !== "primitive") {
      throw new QueryTypeError(
        `Literal lists hold primitives, got ${formatType(resolved)}`,
      );
    }
    return list(
      values.map((value) => this.literal(value, resolved)),
      resolved,
    );
  }

  /**
   * A typed expression from a drizzle `sql` template. Interpolated
   * expressions are substituted by drizzle.
   *
   * @example
   * ```typescript
   * const answer = qb.makeSql(T.int, sql`(${a.sql} + 1)`);
   * const rows = qb.makeSql(relationType({ id: T.int }), sql`SELECT 1 AS "id"`);
   * ```
   */
  makeSql(type: PrimitiveType, query: SQL): ScalarExpr;
  makeSql(type: RelationType, query: SQL): RelationExpr;
  makeSql(
    type: PrimitiveType | RelationType,
    query: SQL,
  ): ScalarExpr | RelationExpr {
    return type.kind === "primitive" ?
        scalar(type, query)
      : relation(type, query);
  }

  /**
   * Reads every column of an existing table. Struct columns are read from
   * their flattened names.
   */
  table(
    name: string,
    columns: Readonly<Record<string, ColumnType>>,
  ): RelationExpr {
    validateSqlIdentifier(name, "table");
    const type = relationType(columns);
    const flat = flattenColumns(type.columns);
    for (const column of flat) {
      validateSqlIdentifier(column.name);
    }
    const projected = commaList(
      flat.map((column) => identifier(this.#dialect, column.name)),
    );
    return relation(
      type,
      sql`SELECT ${projected} FROM ${identifier(this.#dialect, name)}`,
    );
  }

  // ============================================================
  // Normalization
  // ============================================================

  /**
   * Normalizes a collection to a relation. Lists render as a UNION ALL of
   * one-row SELECTs in a column named `value`.
   */
  toRelation(collection: Collection): RelationExpr {
    if (collection.kind === "relation") {
      return collection;
    }

    const itemType = collection.type.item;
    if (itemType.kind !== "primitive") {
      throw new QueryTypeError(
        `Only lists of primitives can be used as a table, got ${formatType(collection.type)}`,
        { type: formatType(collection.type) },
      );
    }

    const type = relationType({ [LIST_COLUMN]: itemType });
    const column = identifier(this.#dialect, LIST_COLUMN);

    if (collection.items.length === 0) {
      return relation(
        type,
        sql`SELECT ${this.#dialect.literal(null, itemType)} AS ${column} WHERE 1 = 0`,
      );
    }

    const rows = collection.items.map((item) => {
      if (item.kind !== "scalar") {
        throw new QueryTypeError(
          `Cannot render ${describeExpr(item)} as a list row`,
          { kind: item.kind },
        );
      }
      return sql`SELECT ${item.sql} AS ${column}`;
    });
    return relation(type, sql.join(rows, sql` UNION ALL `));
  }

  /**
   * The single rendered column of a relation.
   *
   * @throws QueryTypeError when the relation has several columns
   */
  soleColumn(source: RelationExpr): FlatColumn {
    const columns = relationColumns(source);
    const [only] = columns;
    if (columns.length !== 1 || only === undefined) {
      throw new QueryTypeError(
        `Expected a table with one column, got ${formatType(source.type)}`,
        { type: formatType(source.type) },
      );
    }
    return only;
  }

  rowRef(source: RelationExpr, alias: string = ROW_ALIAS): RowRef {
    const columns = relationColumns(source);
    const dialect = this.#dialect;
    return Object.freeze({
      alias,
      type: source.type,
      columns,
      column(name: string): ScalarExpr {
        const column = findColumn(columns, name);
        return scalar(column.type, qualified(dialect, alias, column.name));
      },
    });
  }

  // ============================================================
  // Relational Operators
  // ============================================================

  /**
   * `SELECT expr AS "name", ... FROM (source) AS t`
   */
  select(
    source: RelationExpr,
    build: (row: RowRef) => Readonly<Record<string, ScalarExpr>>,
  ): RelationExpr {
    const outputs = Object.entries(build(this.rowRef(source)));
    const columns: Record<string, PrimitiveType> = {};
    for (const [name, expr] of outputs) {
      validateSqlIdentifier(name);
      columns[name] = expr.type;
    }
    const projected = commaList(
      outputs.map(([name, expr]) => aliased(this.#dialect, expr.sql, name)),
    );
    return relation(
      relationType(columns),
      sql`SELECT ${projected} FROM ${subquerySource(source, ROW_ALIAS)}`,
    );
  }

  /**
   * `SELECT t.* FROM (source) AS t WHERE predicate`
   */
  where(
    source: RelationExpr,
    predicate: (row: RowRef) => ScalarExpr,
  ): RelationExpr {
    const row = this.rowRef(source);
    const condition = predicate(row);
    if (condition.type.name !== "bool") {
      throw new QueryTypeError(
        `WHERE expects a bool predicate, got ${condition.type.name}`,
      );
    }
    return relation(
      source.type,
      sql`SELECT ${projectColumns(this.#dialect, ROW_ALIAS, row.columns)} FROM ${subquerySource(source, ROW_ALIAS)} WHERE ${condition.sql}`,
    );
  }

  /**
   * Groups by `keys` (or the whole relation when empty) and projects the
   * values `build` returns.
   *
   * @example
   * ```typescript
   * qb.groupBy(scores, ["team"], (group) => ({
   *   team: group.key("team"),
   *   total: fns.sum(group.column("points")),
   * }));
   * ```
   */
  groupBy(
    source: RelationExpr,
    keys: readonly string[],
    build: (group: GroupRow) => Readonly<Record<string, ScalarExpr>>,
  ): RelationExpr {
    const row = this.rowRef(source);
    const keyColumns = keys.map((key) => findColumn(row.columns, key));
    const dialect = this.#dialect;
    const group: GroupRow = Object.freeze({
      key(name: string): ScalarExpr {
        if (!keys.includes(name)) {
          throw new QueryTypeError(`"${name}" is not a grouping key`, {
            column: name,
            keys,
          });
        }
        return row.column(name);
      },
      column(name: string): AggregateExpr {
        const column = findColumn(row.columns, name);
        return aggregate(
          column.type,
          qualified(dialect, ROW_ALIAS, column.name),
        );
      },
    });

    const grouped = this.select(source, () => build(group));
    if (keyColumns.length === 0) {
      return grouped;
    }
    const groupKeys = projectColumns(dialect, ROW_ALIAS, keyColumns);
    return relation(grouped.type, sql`${grouped.sql} GROUP BY ${groupKeys}`);
  }

  /**
   * `SELECT cols FROM (source) AS t LIMIT n [OFFSET m]`
   *
   * @throws QueryValueError when `count` or `offset` is not a
   * non-negative integer
   */
  limit(source: RelationExpr, count: number, offset?: number): RelationExpr {
    if (!isNonNegativeInteger(count)) {
      throw new QueryValueError("limit must be a non-negative integer", {
        constraint: "limit >= 0",
        value: count,
      });
    }
    if (offset !== undefined && !isNonNegativeInteger(offset)) {
      throw new QueryValueError("offset must be a non-negative integer", {
        constraint: "offset >= 0",
        value: offset,
      });
    }

    const columns = projectColumns(
      this.#dialect,
      ROW_ALIAS,
      relationColumns(source),
    );
    const offsetClause =
      offset === undefined ? sql`` : sql.raw(` OFFSET ${offset}`);
    return relation(
      source.type,
      sql`SELECT ${columns} FROM ${subquerySource(source, ROW_ALIAS)} LIMIT ${sql.raw(String(count))}${offsetClause}`,
    );
  }

  /**
   * Concatenates two relations with the same columns, keeping duplicates.
   * Each side is wrapped as a subquery so either may carry LIMIT.
   */
  unionAll(left: RelationExpr, right: RelationExpr): RelationExpr {
    const leftColumns = relationColumns(left);
    const rightColumns = relationColumns(right);
    const matches =
      leftColumns.length === rightColumns.length &&
      leftColumns.every(
        (column, index) => rightColumns[index]?.name === column.name,
      );
    if (!matches) {
      throw new QueryTypeError(
        `Cannot concatenate ${formatType(left.type)} with ${formatType(right.type)}`,
      );
    }

    const side = (source: RelationExpr): SQL =>
      sql`SELECT ${projectColumns(this.#dialect, ROW_ALIAS, leftColumns)} FROM ${subquerySource(source, ROW_ALIAS)}`;
    return relation(left.type, sql`${side(left)} UNION ALL ${side(right)}`);
  }

  // ============================================================
  // Extraction
  // ============================================================

  /**
   * The value of a one-column relation that must return exactly one row.
   * The row count is checked by the executor.
   */
  one(source: RelationExpr): ScalarExpr {
    return this.#extract(source, "one");
  }

  /**
   * Like `one`, but an empty relation yields `null`.
   */
  oneOrNone(source: RelationExpr): ScalarExpr {
    return this.#extract(source, "one_or_none");
  }

  #extract(
    source: RelationExpr,
    cardinality: "one" | "one_or_none",
  ): ScalarExpr {
    const column = this.soleColumn(source);
    return scalar(column.type, sql`(${source.sql})`, {
      relation: source,
      cardinality,
    });
  }

  /**
   * `SELECT COUNT(*) AS "count" FROM (source) AS t`
   */
  countRows(source: RelationExpr): SQL {
    return sql`SELECT COUNT(*) AS ${identifier(this.#dialect, "count")} FROM ${subquerySource(source, ROW_ALIAS)}`;
  }

  // ============================================================
  // Recursion
  // ============================================================

  beginRecursive(definition: RecursiveDefinition): RecursiveQueryHandle {
    return beginRecursive(this.#dialect, definition);
  }

  finalizeRecursive(handle: RecursiveQueryHandle): RelationExpr {
    return finalizeRecursive(handle);
  }
}
