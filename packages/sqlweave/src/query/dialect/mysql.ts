/**
 * MySQL Dialect Adapter
 *
 * Backtick identifiers, `/` as float division, and no FULL OUTER JOIN.
 */
import { sql } from "drizzle-orm";

import { defineDialect } from "./common";

export const mysqlDialect = defineDialect(
  {
    name: "mysql",
    family: "mysql",
    capabilities: {
      forceRecursiveWorktableOuterJoinOrder: false,
      supportsFullOuterJoin: false,
      typedRecursiveColumns: true,
    },
  },
  {
    quoteIdentifier(name) {
      return `\`${name.replaceAll("`", "``")}\``;
    },

    sqlType(type) {
      switch (type.name) {
        case "int": {
          return "BIGINT";
        }
        case "float": {
          return "DOUBLE";
        }
        case "bool": {
          return "BOOLEAN";
        }
        case "datetime": {
          return "DATETIME";
        }
        case "string":
        case "null": {
          return "TEXT";
        }
      }
    },

    random() {
      return sql`RAND()`;
    },

    castInt(value) {
      return sql`CAST(${value} AS SIGNED INTEGER)`;
    },

    castFloat(value) {
      return sql`CAST(${value} AS DOUBLE)`;
    },

    castString(value) {
      return sql`CAST(${value} AS CHAR)`;
    },

    castAs(value, type) {
      // CAST takes SIGNED and CHAR, not the column types BIGINT and TEXT
      switch (type.name) {
        case "int":
        case "bool": {
          return this.castInt(value);
        }
        case "float": {
          return this.castFloat(value);
        }
        case "datetime": {
          return sql`CAST(${value} AS DATETIME)`;
        }
        case "string":
        case "null": {
          return this.castString(value);
        }
      }
    },

    intDiv(dividend, divisor) {
      return sql`(${dividend} DIV ${divisor})`;
    },

    strIndex(needle, haystack) {
      return sql`(LOCATE(${needle}, ${haystack}) - 1)`;
    },

    char(code) {
      return sql`CHAR(${code} USING utf8mb4)`;
    },

    charOrd(value) {
      return sql`ORD(${value})`;
    },

    length(value) {
      // LENGTH counts bytes in MySQL
      return sql`CHAR_LENGTH(${value})`;
    },

    firstInGroup(value) {
      // JSON_UNQUOTE turns a JSON null into the string 'null'
      const first = sql`JSON_EXTRACT(JSON_ARRAYAGG(${value}), '$[0]')`;
      return sql`(CASE WHEN JSON_TYPE(${first}) = 'NULL' THEN NULL ELSE JSON_UNQUOTE(${first}) END)`;
    },
  },
);
