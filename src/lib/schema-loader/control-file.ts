/**
 * Control file front-end - flat `schema.csv` with one row per column
 *
 * Header: table,column,not_null,unique,primary_key,type,references_table,references_column
 *
 * The file is validated against a built-in metaschema with the data validator
 * itself before it is lowered, so flags are known to be `true`/`false` and
 * every row has all eight cells.
 */

import { basename, extname } from "path";
import type { Column, ColumnSpec, DataType, Schema, TableSpec } from "../../types/schema.js";
import type { Row } from "../source/types.js";
import { InMemoryRowSource, parseCsvText } from "../source/memory-source.js";
import { lintTables } from "../validator/index.js";
import { parseDataType } from "../values/index.js";
import { readSchemaFile } from "./document.js";
import { SchemaParseError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const CONTROL_FILE_COLUMNS = [
  "table",
  "column",
  "not_null",
  "unique",
  "primary_key",
  "type",
  "references_table",
  "references_column",
] as const;

/**
 * Metaschema describing a control file stored as table `tableName`
 */
export function controlFileMetaschema(tableName: string): Schema {
  const flags = new Set(["not_null", "unique", "primary_key"]);
  const nullable = new Set(["references_table", "references_column"]);

  return [
    {
      name: tableName,
      uniqueColumns: [],
      foreignKeys: [],
      columns: CONTROL_FILE_COLUMNS.map(
        (name): ColumnSpec => ({
          name,
          type: flags.has(name) ? { kind: "bool" } : { kind: "string" },
          notNull: !nullable.has(name),
        }),
      ),
    },
  ];
}

interface PendingTable {
  spec: TableSpec;
  primaryKey: string[];
}

/**
 * Lower validated control-file rows (header excluded) to the canonical schema
 * Tables keep the order of their first row; primary key columns keep column order.
 *
 * @throws SchemaParseError for unknown types or half-filled references
 */
export function lowerControlRows(rows: readonly Row[], origin: string): Schema {
  const tables = new Map<string, PendingTable>();

  rows.forEach((row, i) => {
    const line = i + 2; // header is line 1
    const [
      tableName = "",
      columnName = "",
      notNull,
      unique,
      primaryKey,
      typeString = "",
      referencesTable = "",
      referencesColumn = "",
    ] = row;

    let pending = tables.get(tableName);
    if (!pending) {
      pending = {
        spec: { name: tableName, uniqueColumns: [], foreignKeys: [], columns: [] },
        primaryKey: [],
      };
      tables.set(tableName, pending);
    }

    pending.spec.columns.push({
      name: columnName,
      type: parseTypeOnLine(typeString, line, origin),
      notNull: notNull === "true",
    });

    const single: Column = [columnName];
    if (primaryKey === "true") {
      pending.primaryKey.push(columnName);
    }
    if (unique === "true") {
      pending.spec.uniqueColumns.push(single);
    }

    if (referencesTable !== "" && referencesColumn !== "") {
      pending.spec.foreignKeys.push({
        localColumn: single,
        foreignTable: referencesTable,
        foreignColumn: [referencesColumn],
      });
    } else if (referencesTable !== "" || referencesColumn !== "") {
      throw new SchemaParseError(
        `Incomplete reference on line ${line} of ${origin}: references_table and references_column must both be set`,
        { origin, line },
      );
    }
  });

  return [...tables.values()].map(({ spec, primaryKey }) => {
    const [head, ...tail] = primaryKey;
    return head === undefined ? spec : { ...spec, primaryKey: [head, ...tail] };
  });
}

function parseTypeOnLine(typeString: string, line: number, origin: string): DataType {
  try {
    return parseDataType(typeString);
  } catch (error) {
    throw new SchemaParseError(
      `Error parsing column type on line ${line} of ${origin}: ${error instanceof Error ? error.message : String(error)}`,
      { origin, line, type: typeString },
      { cause: error },
    );
  }
}

/**
 * Parse control-file text: metaschema validation, then lowering
 */
export async function parseControlFile(
  text: string,
  origin: string,
  delimiter: string = ",",
): Promise<Schema> {
  const tableName = basename(origin, extname(origin));
  const rows = parseCsvText(tableName, text, delimiter);
  await lintTables(
    controlFileMetaschema(tableName),
    new InMemoryRowSource({ [tableName]: rows }),
  );
  return lowerControlRows(rows.slice(1), origin);
}

export async function loadControlFile(
  filePath: string,
  delimiter: string = ",",
): Promise<Schema> {
  const text = await readSchemaFile(filePath);
  const schema = await parseControlFile(text, filePath, delimiter);
  logger.info("Loaded schema control file", { filePath, tables: schema.length });
  return schema;
}
