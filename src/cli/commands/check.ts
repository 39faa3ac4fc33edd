/**
 * Check CLI command - schema consistency only, no data is read
 */

import { Command } from "commander";
import { checkSchema } from "../../lib/consistency/index.js";
import { loadSchema } from "../../lib/schema-loader/index.js";
import type { AnnotatedSchema } from "../../types/schema.js";
import type { CheckCommandOptions } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import { applyConfigLogLevel } from "./log-level.js";
import { reportFailure } from "./report.js";
import { validateDelimiter } from "../../utils/config-loader.js";
import { ConfigError } from "../../utils/errors.js";

export async function runCheck(options: CheckCommandOptions): Promise<AnnotatedSchema> {
  const config = options.config ? parseConfigFile(options.config) : {};
  applyConfigLogLevel(config);

  const schemaPath = options.schema ?? config.validate?.schema;
  if (!schemaPath) {
    throw new ConfigError("Missing schema path: pass --schema or set validate.schema");
  }

  const delimiter = options.delimiter ?? config.validate?.delimiter;
  if (delimiter !== undefined) {
    validateDelimiter(delimiter);
  }

  const { schema } = await loadSchema(schemaPath, { delimiter });
  return checkSchema(schema);
}

export function createCheckCommand(): Command {
  return new Command("check")
    .description("Check a schema for consistency without reading any data")
    .option("--schema <path>", "Schema document (.json, .yaml, .yml) or control file (.csv)")
    .option("--delimiter <char>", "Field delimiter of a control-file schema")
    .option("--config <path>", "Configuration file (.json, .yaml, .yml)")
    .action(async (options: CheckCommandOptions) => {
      try {
        await runCheck(options);
      } catch (error) {
        reportFailure("check", error);
      }
    });
}
