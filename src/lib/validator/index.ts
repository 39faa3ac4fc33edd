/**
 * Data validator - streams each table's rows through its check pipeline
 * Tables run one at a time in schema order; the first violation ends the pass.
 */

export * from "./row-checks.js";

import type { AnnotatedSchema, AnnotatedTableSpec, Schema } from "../../types/schema.js";
import type { Row, RowSource } from "../source/types.js";
import { buildRowChecks } from "./row-checks.js";
import { checkSchema } from "../consistency/index.js";
import { DataError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export interface TableSummary {
  table: string;
  rows: number;
}

/**
 * Header must list exactly the declared columns, in declaration order
 */
export function checkHeader(table: AnnotatedTableSpec, header: Row): void {
  if (header.length !== table.columns.length) {
    throw new DataError(
      "header-arity",
      { table: table.name, row: 1 },
      `Column number mismatch in '${table.name}'; wanted ${table.columns.length} columns, found ${header.length}`,
    );
  }

  table.columns.forEach((column, position) => {
    const found = header[position];
    if (found !== column.name) {
      throw new DataError(
        "header-mismatch",
        { table: table.name, row: 1, column: column.name, value: found },
        `Header mismatch in '${table.name}' at position ${position + 1}: wanted '${column.name}', found '${found}'`,
      );
    }
  });
}

/**
 * Validate one table's data against its annotated spec
 *
 * @returns Number of data rows checked
 * @throws DataError on the first violation
 */
export async function validateTable(
  table: AnnotatedTableSpec,
  source: RowSource,
): Promise<TableSummary> {
  return source.withTable(table.name, async (header, rows) => {
    checkHeader(table, header);
    const checks = buildRowChecks(table);

    let line = 1;
    for await (const row of rows) {
      line++;
      for (const check of checks) {
        check(row, line);
      }
    }

    const summary = { table: table.name, rows: line - 1 };
    logger.debug("Table data is valid", { ...summary });
    return summary;
  });
}

/**
 * Validate every table of a checked schema, in schema order
 *
 * @throws DataError | SourceError for the first failure
 */
export async function validateData(
  tables: AnnotatedSchema,
  source: RowSource,
): Promise<TableSummary[]> {
  const summaries: TableSummary[] = [];
  for (const table of tables.values()) {
    summaries.push(await validateTable(table, source));
  }
  return summaries;
}

/**
 * Consistency check followed by data validation
 */
export async function lintTables(
  schema: Schema,
  source: RowSource,
): Promise<TableSummary[]> {
  return validateData(checkSchema(schema), source);
}
