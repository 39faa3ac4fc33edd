/**
 * Column helpers - construction, positional equality, rendering and name lookup
 */

import type { Column, ColumnName, ColumnSpec } from "../../types/schema.js";

/**
 * Build a Column from a list of names
 * Returns undefined for an empty list; a Column always has at least one name.
 */
export function toColumn(names: readonly ColumnName[]): Column | undefined {
  const [head, ...tail] = names;
  if (head === undefined) {
    return undefined;
  }
  return [head, ...tail];
}

/**
 * Positional equality: same length, same names in the same order
 *
 * @example
 * columnEquals(["a", "b"], ["a", "b"]) // true
 * columnEquals(["a", "b"], ["b", "a"]) // false
 */
export function columnEquals(a: Column, b: Column): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

/**
 * Render a column for messages: `'id'` or `('a', 'b')`
 */
export function formatColumn(column: Column): string {
  const quoted = column.map((name) => `'${name}'`);
  return quoted.length === 1 ? quoted.join("") : `(${quoted.join(", ")})`;
}

/**
 * Render a key tuple for messages; same quoting as formatColumn
 */
export function formatTuple(values: readonly string[]): string {
  return `(${values.map((value) => `'${value}'`).join(", ")})`;
}

/**
 * Position of the column spec named `name`, or undefined
 */
export function findColumnIndex(
  columns: readonly ColumnSpec[],
  name: ColumnName,
): number | undefined {
  const index = columns.findIndex((column) => column.name === name);
  return index === -1 ? undefined : index;
}

/**
 * First name of `column` that does not resolve in `columns`, or undefined when all resolve
 */
export function findUnresolvedName(
  columns: readonly ColumnSpec[],
  column: Column,
): ColumnName | undefined {
  return column.find((name) => findColumnIndex(columns, name) === undefined);
}
