/**
 * Schema loading - both front-ends lower to the canonical Schema
 * `.csv` selects the control file; `.json`, `.yaml` and `.yml` the schema document.
 */

export * from "./types.js";
export {
  loadSchemaDocument,
  parseSchemaDocument,
  schemaDocumentSchema,
} from "./document.js";
export {
  CONTROL_FILE_COLUMNS,
  controlFileMetaschema,
  loadControlFile,
  lowerControlRows,
  parseControlFile,
} from "./control-file.js";

import type { LoadedSchema } from "./types.js";
import { loadSchemaDocument } from "./document.js";
import { loadControlFile } from "./control-file.js";

export function isControlFile(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(".csv");
}

export async function loadSchema(
  filePath: string,
  options: { delimiter?: string } = {},
): Promise<LoadedSchema> {
  if (isControlFile(filePath)) {
    return {
      schema: await loadControlFile(filePath, options.delimiter),
      format: "control-file",
      path: filePath,
    };
  }
  return {
    schema: await loadSchemaDocument(filePath),
    format: "document",
    path: filePath,
  };
}
