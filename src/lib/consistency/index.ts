/**
 * Schema consistency checker
 * Proves a schema is well-formed before any data is read, and resolves
 * primary key names to column positions for the data validator.
 */

import type {
  AnnotatedSchema,
  AnnotatedTableSpec,
  ForeignKeyMapping,
  Schema,
  TableName,
  TableSpec,
} from "../../types/schema.js";
import {
  columnEquals,
  findColumnIndex,
  findUnresolvedName,
  formatColumn,
} from "../column/index.js";
import { dataTypeEquals, formatDataType } from "../values/index.js";
import { SchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Check a schema in isolation; the first violation is thrown
 *
 * @returns Annotated tables keyed by name, in schema order
 * @throws SchemaError
 */
export function checkSchema(schema: Schema): AnnotatedSchema {
  const tablesByName = indexTables(schema);
  const annotated = new Map<TableName, AnnotatedTableSpec>();

  for (const table of schema) {
    checkColumnNames(table);
    const primaryKeyIndices = resolvePrimaryKey(table);
    checkUniqueColumns(table);
    for (const foreignKey of table.foreignKeys) {
      checkForeignKey(table, foreignKey, tablesByName);
    }

    annotated.set(
      table.name,
      primaryKeyIndices ? { ...table, primaryKeyIndices } : { ...table },
    );
  }

  logger.debug("Schema is consistent", { tables: annotated.size });
  return annotated;
}

function indexTables(schema: Schema): Map<TableName, TableSpec> {
  const tablesByName = new Map<TableName, TableSpec>();
  for (const table of schema) {
    if (table.name === "") {
      throw new SchemaError("empty-table-name", table.name, "Invalid table name: ''");
    }
    if (tablesByName.has(table.name)) {
      throw new SchemaError(
        "duplicate-table",
        table.name,
        `Table name exists: '${table.name}'`,
      );
    }
    tablesByName.set(table.name, table);
  }
  return tablesByName;
}

function checkColumnNames(table: TableSpec): void {
  const seen = new Set<string>();
  for (const column of table.columns) {
    if (column.name === "") {
      throw new SchemaError(
        "empty-column-name",
        table.name,
        `Invalid column name: '${table.name}'.''`,
      );
    }
    if (seen.has(column.name)) {
      throw new SchemaError(
        "duplicate-column",
        table.name,
        `Column name exists: '${table.name}'.'${column.name}'`,
        { column: column.name },
      );
    }
    seen.add(column.name);
  }
}

function resolvePrimaryKey(table: TableSpec): number[] | undefined {
  if (!table.primaryKey) {
    return undefined;
  }

  const indices: number[] = [];
  for (const name of table.primaryKey) {
    const index = findColumnIndex(table.columns, name);
    if (index === undefined) {
      throw new SchemaError(
        "unresolved-primary-key",
        table.name,
        `Primary key column not found: '${table.name}'.'${name}'`,
        { column: name },
      );
    }
    indices.push(index);
  }
  return indices;
}

function checkUniqueColumns(table: TableSpec): void {
  for (const unique of table.uniqueColumns) {
    const missing = findUnresolvedName(table.columns, unique);
    if (missing !== undefined) {
      throw new SchemaError(
        "unresolved-unique-column",
        table.name,
        `Unique column not found: '${table.name}'.'${missing}'`,
        { column: missing },
      );
    }
  }
}

function checkForeignKey(
  table: TableSpec,
  foreignKey: ForeignKeyMapping,
  tablesByName: ReadonlyMap<TableName, TableSpec>,
): void {
  const { localColumn, foreignTable: foreignTableName, foreignColumn } = foreignKey;
  const describe = `Foreign key '${table.name}'.${formatColumn(localColumn)} -> '${foreignTableName}'.${formatColumn(foreignColumn)}`;

  if (localColumn.length !== foreignColumn.length) {
    throw new SchemaError(
      "foreign-key-arity",
      table.name,
      `${describe}: local column has ${localColumn.length} names, foreign column has ${foreignColumn.length}`,
    );
  }

  const foreignTable = tablesByName.get(foreignTableName);
  if (!foreignTable) {
    throw new SchemaError(
      "unresolved-foreign-table",
      table.name,
      `${describe}: table '${foreignTableName}' is missing from the schema`,
      { foreignTable: foreignTableName },
    );
  }

  if (!foreignTable.primaryKey) {
    throw new SchemaError(
      "foreign-table-without-primary-key",
      table.name,
      `${describe}: table '${foreignTableName}' has no primary key`,
      { foreignTable: foreignTableName },
    );
  }

  if (!columnEquals(foreignColumn, foreignTable.primaryKey)) {
    throw new SchemaError(
      "foreign-column-not-primary-key",
      table.name,
      `${describe}: foreign column must be the primary key ${formatColumn(foreignTable.primaryKey)} of '${foreignTableName}'`,
      { foreignTable: foreignTableName },
    );
  }

  const missingLocal = findUnresolvedName(table.columns, localColumn);
  if (missingLocal !== undefined) {
    throw new SchemaError(
      "unresolved-foreign-key-column",
      table.name,
      `${describe}: column not found: '${table.name}'.'${missingLocal}'`,
      { column: missingLocal },
    );
  }
  const missingForeign = findUnresolvedName(foreignTable.columns, foreignColumn);
  if (missingForeign !== undefined) {
    throw new SchemaError(
      "unresolved-foreign-key-column",
      table.name,
      `${describe}: column not found: '${foreignTableName}'.'${missingForeign}'`,
      { column: missingForeign },
    );
  }

  localColumn.forEach((localName, position) => {
    const foreignName = foreignColumn[position];
    const local = table.columns.find((column) => column.name === localName);
    const foreign = foreignTable.columns.find((column) => column.name === foreignName);
    // Both resolved above
    if (!local || !foreign) {
      return;
    }
    if (!dataTypeEquals(local.type, foreign.type)) {
      throw new SchemaError(
        "foreign-key-type-mismatch",
        table.name,
        `${describe}: type mismatch between '${table.name}'.'${localName}' (${formatDataType(local.type)}) and '${foreignTableName}'.'${foreign.name}' (${formatDataType(foreign.type)})`,
        { column: localName },
      );
    }
  });
}
