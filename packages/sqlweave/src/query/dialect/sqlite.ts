/**
 * SQLite Dialect Adapter
 *
 * SQLite has no boolean type, no REPEAT and no built-in PI, and its
 * RANDOM() returns a signed 64-bit integer.
 */
import { sql } from "drizzle-orm";

import { columnDefinitions, defineDialect } from "./common";

/** 2^53 - 1: keeps the random mantissa exactly representable. */
const RANDOM_MASK = 9007199254740991;

export const sqliteDialect = defineDialect(
  {
    name: "sqlite",
    family: "sqlite_like",
    capabilities: {
      forceRecursiveWorktableOuterJoinOrder: true,
      supportsFullOuterJoin: true,
      typedRecursiveColumns: false,
    },
  },
  {
    bindValue(value) {
      // SQLite doesn't support native booleans, convert to 0/1
      if (typeof value === "boolean") {
        return value ? 1 : 0;
      }
      if (value instanceof Date) {
        return value.toISOString();
      }
      return value;
    },

    sqlType(type) {
      switch (type.name) {
        case "int":
        case "bool": {
          return "INTEGER";
        }
        case "float": {
          return "REAL";
        }
        case "string":
        case "datetime":
        case "null": {
          return "TEXT";
        }
      }
    },

    createTempTable(name, columns) {
      return sql.raw(
        `CREATE TEMP TABLE ${this.quoteIdentifier(name)} (${columnDefinitions(this, columns)})`,
      );
    },

    random() {
      return sql.raw(
        `((RANDOM() & ${RANDOM_MASK}) / ${RANDOM_MASK + 1}.0)`,
      );
    },

    pi() {
      return sql.raw("3.141592653589793");
    },

    char(code) {
      return sql`CHAR(${code})`;
    },

    charOrd(value) {
      return sql`UNICODE(${value})`;
    },

    repeat(value, times) {
      // printf's %c repeats its character `precision` times
      return sql`REPLACE(PRINTF('%.*c', ${times}, 'x'), 'x', ${value})`;
    },

    now() {
      return sql`datetime('now')`;
    },

    firstInGroup(value) {
      return sql`json_extract(json_group_array(${value}), '$[0]')`;
    },
  },
);
