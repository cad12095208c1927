/**
 * PostgreSQL Dialect Adapter
 *
 * Parameters are cast explicitly: PostgreSQL cannot infer the type of a
 * bare placeholder in a SELECT list or across a UNION. `int` is BIGINT, so
 * functions whose argument is 32-bit get an explicit narrowing cast.
 */
import { sql } from "drizzle-orm";

import { defineDialect } from "./common";

export const postgresDialect = defineDialect(
  {
    name: "postgres",
    family: "postgres",
    capabilities: {
      forceRecursiveWorktableOuterJoinOrder: false,
      supportsFullOuterJoin: true,
      typedRecursiveColumns: true,
    },
  },
  {
    literal(value, type) {
      if (value === null) {
        return sql.raw(`CAST(NULL AS ${this.sqlType(type)})`);
      }
      return sql`CAST(${this.bindValue(value)} AS ${sql.raw(this.sqlType(type))})`;
    },

    sqlType(type) {
      switch (type.name) {
        case "int": {
          return "BIGINT";
        }
        case "float": {
          return "DOUBLE PRECISION";
        }
        case "bool": {
          return "BOOLEAN";
        }
        case "datetime": {
          return "TIMESTAMPTZ";
        }
        case "string":
        case "null": {
          return "TEXT";
        }
      }
    },

    round(value, digits) {
      // ROUND(double precision, int) does not exist; numeric does.
      return sql`ROUND(CAST(${value} AS NUMERIC), CAST(${digits} AS INTEGER))`;
    },

    char(code) {
      return sql`CHR(CAST(${code} AS INTEGER))`;
    },

    repeat(value, times) {
      return sql`REPEAT(${value}, CAST(${times} AS INTEGER))`;
    },

    strIndex(needle, haystack) {
      return sql`(STRPOS(${haystack}, ${needle}) - 1)`;
    },
  },
);
