/**
 * DuckDB Dialect Adapter
 *
 * The embedded-analytics dialect. It is the only one that exposes
 * `countDistinct` and the date-part extractors.
 */
import { sql } from "drizzle-orm";

import { columnDefinitions, defineDialect } from "./common";
import { type DatePart } from "./types";

const DATE_PART_FUNCTIONS: Readonly<Record<DatePart, string>> = {
  year: "YEAR",
  month: "MONTH",
  day: "DAY",
  hour: "HOUR",
  minute: "MINUTE",
  day_of_week: "DAYOFWEEK",
  week_of_year: "WEEKOFYEAR",
};

export const duckdbDialect = defineDialect(
  {
    name: "duck",
    family: "sqlite_like",
    capabilities: {
      forceRecursiveWorktableOuterJoinOrder: true,
      supportsFullOuterJoin: true,
      typedRecursiveColumns: false,
    },
  },
  {
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
          return "TIMESTAMP";
        }
        case "string":
        case "null": {
          return "VARCHAR";
        }
      }
    },

    createTempTable(name, columns) {
      return sql.raw(
        `CREATE TEMP TABLE ${this.quoteIdentifier(name)} (${columnDefinitions(this, columns)})`,
      );
    },

    castFloat(value) {
      return sql`CAST(${value} AS DOUBLE)`;
    },

    intDiv(dividend, divisor) {
      // `/` is float division in DuckDB
      return sql`(${dividend} // ${divisor})`;
    },

    charOrd(value) {
      return sql`UNICODE(${value})`;
    },

    now() {
      return sql`CURRENT_TIMESTAMP`;
    },

    firstInGroup(value) {
      return sql`FIRST(${value})`;
    },

    countDistinct(value) {
      return sql`COUNT(DISTINCT ${value})`;
    },

    datePart(part, value) {
      return sql`${sql.raw(DATE_PART_FUNCTIONS[part])}(${value})`;
    },
  },
);
