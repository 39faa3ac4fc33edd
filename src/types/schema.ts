/**
 * Canonical schema model for tablelint
 * Every schema front-end lowers to these structures; the consistency checker
 * and data validator only ever see this form.
 */

/**
 * DataType - closed set of column types
 * Two date types are equal only when their format strings are identical.
 */
export type DataType =
  | { kind: "int" }
  | { kind: "bool" }
  | { kind: "string" }
  | { kind: "date"; format: string };

export type ColumnName = string;

export type TableName = string;

/**
 * Column - ordered, non-empty list of column names
 * A single column is a one-element list; composite keys have several.
 * Order is significant.
 */
export type Column = readonly [ColumnName, ...ColumnName[]];

export interface ColumnSpec {
  name: ColumnName;
  type: DataType;
  notNull: boolean;
}

/**
 * ForeignKeyMapping - `localColumn` must match the primary key of `foreignTable`
 */
export interface ForeignKeyMapping {
  localColumn: Column;
  foreignTable: TableName;
  foreignColumn: Column;
}

export interface TableSpec {
  name: TableName;
  primaryKey?: Column;
  uniqueColumns: Column[];
  foreignKeys: ForeignKeyMapping[];
  columns: ColumnSpec[];
}

export type Schema = TableSpec[];

/**
 * AnnotatedTableSpec - TableSpec with primary key names resolved to positions in `columns`
 * Produced once by the consistency checker, read-only afterwards.
 */
export interface AnnotatedTableSpec extends TableSpec {
  primaryKeyIndices?: readonly number[];
}

/**
 * Checked schema, keyed by table name; iteration order is schema order
 */
export type AnnotatedSchema = ReadonlyMap<TableName, AnnotatedTableSpec>;
