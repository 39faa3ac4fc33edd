/**
 * Schema document front-end - JSON or YAML tables with composite keys
 */

import { readFile } from "fs/promises";
import { Ajv } from "ajv";
import { parse as parseYaml } from "yaml";
import type { Column, Schema, TableSpec } from "../../types/schema.js";
import type {
  ColumnInput,
  SchemaDocument,
  TableDocument,
} from "./types.js";
import { toColumn } from "../column/index.js";
import { parseDataType } from "../values/index.js";
import { FileIOError, SchemaParseError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const columnInputSchema = {
  oneOf: [
    { type: "string" },
    { type: "array", items: { type: "string" }, minItems: 1 },
  ],
};

const tableSchema = {
  type: "object",
  required: ["name", "columns"],
  additionalProperties: false,
  properties: {
    name: { type: "string" },
    primary_key: { oneOf: [columnInputSchema, { type: "null" }] },
    unique_columns: { type: "array", items: columnInputSchema },
    foreign_keys: {
      type: "array",
      items: {
        type: "object",
        required: ["local_column", "foreign_table", "foreign_column"],
        additionalProperties: false,
        properties: {
          local_column: columnInputSchema,
          foreign_table: { type: "string" },
          foreign_column: columnInputSchema,
        },
      },
    },
    columns: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "type"],
        additionalProperties: false,
        properties: {
          name: { type: "string" },
          type: { type: "string" },
          not_null: { type: "boolean" },
        },
      },
    },
  },
};

export const schemaDocumentSchema = {
  oneOf: [
    { type: "array", items: tableSchema },
    {
      type: "object",
      required: ["tables"],
      additionalProperties: false,
      properties: { tables: { type: "array", items: tableSchema } },
    },
  ],
};

const ajv = new Ajv({ strict: false });
const validateDocument = ajv.compile<SchemaDocument>(schemaDocumentSchema);

/**
 * Lower an already-decoded document to the canonical schema
 *
 * @param origin - Where the document came from, for messages
 * @throws SchemaParseError
 */
export function parseSchemaDocument(content: unknown, origin: string): Schema {
  if (!validateDocument(content)) {
    const [first] = validateDocument.errors ?? [];
    const where = first?.instancePath || "/";
    throw new SchemaParseError(
      `Invalid schema document ${origin}: ${where} ${first?.message ?? "is invalid"}`,
      { origin, path: where },
    );
  }

  const tables = Array.isArray(content) ? content : content.tables;
  return tables.map((table) => lowerTable(table, origin));
}

function lowerColumn(input: ColumnInput, origin: string, where: string): Column {
  const column = toColumn(typeof input === "string" ? [input] : input);
  if (!column) {
    throw new SchemaParseError(`Empty column list at ${where} in ${origin}`, {
      origin,
      path: where,
    });
  }
  return column;
}

function lowerTable(table: TableDocument, origin: string): TableSpec {
  const spec: TableSpec = {
    name: table.name,
    uniqueColumns: (table.unique_columns ?? []).map((unique, i) =>
      lowerColumn(unique, origin, `'${table.name}' unique_columns[${i}]`),
    ),
    foreignKeys: (table.foreign_keys ?? []).map((foreignKey, i) => ({
      localColumn: lowerColumn(
        foreignKey.local_column,
        origin,
        `'${table.name}' foreign_keys[${i}].local_column`,
      ),
      foreignTable: foreignKey.foreign_table,
      foreignColumn: lowerColumn(
        foreignKey.foreign_column,
        origin,
        `'${table.name}' foreign_keys[${i}].foreign_column`,
      ),
    })),
    columns: table.columns.map((column) => {
      try {
        return {
          name: column.name,
          type: parseDataType(column.type),
          notNull: column.not_null ?? false,
        };
      } catch (error) {
        throw new SchemaParseError(
          `Error parsing column type for '${table.name}'.'${column.name}' in ${origin}: ${error instanceof Error ? error.message : String(error)}`,
          { origin, table: table.name, column: column.name, type: column.type },
          { cause: error },
        );
      }
    }),
  };

  if (table.primary_key !== undefined && table.primary_key !== null) {
    spec.primaryKey = lowerColumn(
      table.primary_key,
      origin,
      `'${table.name}' primary_key`,
    );
  }
  return spec;
}

/**
 * Load a schema document from a `.json`, `.yaml` or `.yml` file
 */
export async function loadSchemaDocument(filePath: string): Promise<Schema> {
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");
  if (!isYaml && !isJson) {
    throw new SchemaParseError(
      `Unsupported schema file format: ${filePath}. Must be .json, .yaml, .yml or .csv`,
      { origin: filePath },
    );
  }

  const content = await readSchemaFile(filePath);

  let decoded: unknown;
  try {
    decoded = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new SchemaParseError(`Failed to parse schema file: ${filePath}`, { origin: filePath }, {
      cause: error,
    });
  }

  const schema = parseSchemaDocument(decoded, filePath);
  logger.info("Loaded schema document", { filePath, tables: schema.length });
  return schema;
}

export async function readSchemaFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new FileIOError(`Schema not found at: ${filePath}`, { filePath }, { cause: error });
    }
    throw new FileIOError(`Failed to read schema from ${filePath}`, { filePath }, {
      cause: error,
    });
  }
}
