/**
 * Schema document shapes, as written in JSON or YAML before lowering
 */

import type { Schema } from "../../types/schema.js";

/** A single column name or a non-empty list of names */
export type ColumnInput = string | string[];

export interface ColumnDocument {
  name: string;
  type: string;
  not_null?: boolean;
}

export interface ForeignKeyDocument {
  local_column: ColumnInput;
  foreign_table: string;
  foreign_column: ColumnInput;
}

export interface TableDocument {
  name: string;
  primary_key?: ColumnInput | null;
  unique_columns?: ColumnInput[];
  foreign_keys?: ForeignKeyDocument[];
  columns: ColumnDocument[];
}

export type SchemaDocument = TableDocument[] | { tables: TableDocument[] };

export type SchemaFormat = "document" | "control-file";

export interface LoadedSchema {
  schema: Schema;
  format: SchemaFormat;
  path: string;
}
