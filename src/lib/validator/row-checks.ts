/**
 * Per-row check pipeline
 * Built once per table before any row is read; each check throws the
 * table's first DataError.
 */

import type { AnnotatedTableSpec } from "../../types/schema.js";
import type { Row } from "../source/types.js";
import { CompositeKeySet } from "../keyset/index.js";
import { formatTuple } from "../column/index.js";
import { valueValidatorFor } from "../values/index.js";
import { DataError } from "../../utils/errors.js";

/**
 * A row check; `line` is the row's 1-based line in the table (header = 1)
 */
export type RowCheck = (row: Row, line: number) => void;

export function cellCountCheck(table: AnnotatedTableSpec): RowCheck {
  const expected = table.columns.length;
  return (row, line) => {
    if (row.length !== expected) {
      throw new DataError(
        "row-arity",
        { table: table.name, row: line },
        `Column count mismatch in '${table.name}' at line ${line}: wanted ${expected} columns, found ${row.length}`,
      );
    }
  };
}

export function cellTypeCheck(table: AnnotatedTableSpec): RowCheck {
  const validators = table.columns.map((column) => ({
    name: column.name,
    validate: valueValidatorFor(column.type),
  }));

  return (row, line) => {
    validators.forEach(({ name, validate }, position) => {
      // cellCountCheck runs first, so every position is present
      const value = row[position];
      const result = validate(value);
      if (!result.ok) {
        throw new DataError(
          "type-mismatch",
          { table: table.name, row: line, column: name, value },
          `'${table.name}'.'${name}' line ${line}: ${result.message}`,
        );
      }
    });
  };
}

export function notNullCheck(table: AnnotatedTableSpec): RowCheck {
  const positions = table.columns.flatMap((column, position) =>
    column.notNull ? [{ name: column.name, position }] : [],
  );

  return (row, line) => {
    for (const { name, position } of positions) {
      if (row[position] === "") {
        throw new DataError(
          "null-violation",
          { table: table.name, row: line, column: name, value: "" },
          `'${table.name}'.'${name}' line ${line}: Found null value in not-null column`,
        );
      }
    }
  };
}

/**
 * Duplicate detection over the primary key projection
 * The key set lives as long as the returned check, i.e. one table pass.
 */
export function primaryKeyCheck(
  table: AnnotatedTableSpec,
  indices: readonly number[],
): RowCheck {
  const seen = new CompositeKeySet();

  return (row, line) => {
    const tuple = indices.map((index) => row[index] ?? "");
    if (seen.exists(tuple)) {
      throw new DataError(
        "duplicate-key",
        { table: table.name, row: line, value: formatTuple(tuple) },
        `'${table.name}' line ${line}: Duplicate primary key ${formatTuple(tuple)}`,
      );
    }
    seen.insert(tuple);
  };
}

/**
 * Checks in their fixed order: cell count, cell types, not-null, primary key
 */
export function buildRowChecks(table: AnnotatedTableSpec): RowCheck[] {
  const checks = [cellCountCheck(table), cellTypeCheck(table), notNullCheck(table)];
  if (table.primaryKeyIndices) {
    checks.push(primaryKeyCheck(table, table.primaryKeyIndices));
  }
  return checks;
}
