/**
 * Validate CLI command - consistency check, then data validation
 */

import { Command } from "commander";
import { checkSchema } from "../../lib/consistency/index.js";
import { loadSchema } from "../../lib/schema-loader/index.js";
import { CsvDirectorySource } from "../../lib/source/index.js";
import { validateData, type TableSummary } from "../../lib/validator/index.js";
import type { ValidateConfig, ValidateCommandOptions } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import { resolveValidateConfig } from "../../utils/config-loader.js";
import { applyConfigLogLevel } from "./log-level.js";
import { reportFailure } from "./report.js";
import { logger } from "../../utils/logger.js";

export async function runValidate(config: ValidateConfig): Promise<TableSummary[]> {
  const { schema } = await loadSchema(config.schema, { delimiter: config.delimiter });
  const tables = checkSchema(schema);

  const summaries = await validateData(
    tables,
    new CsvDirectorySource({
      rootDirectory: config.dataDir,
      extension: config.extension,
      delimiter: config.delimiter,
    }),
  );

  logger.info("Data is valid", {
    tables: summaries.length,
    rows: summaries.reduce((total, summary) => total + summary.rows, 0),
  });
  return summaries;
}

export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Validate a directory of delimited files against a schema")
    .option("--schema <path>", "Schema document (.json, .yaml, .yml) or control file (.csv)")
    .option("--data-dir <dir>", "Directory with one data file per table")
    .option("--extension <ext>", "Data file extension appended to table names")
    .option("--delimiter <char>", "Field delimiter")
    .option("--config <path>", "Configuration file (.json, .yaml, .yml)")
    .action(async (options: ValidateCommandOptions) => {
      try {
        const configFile = options.config ? parseConfigFile(options.config) : {};
        applyConfigLogLevel(configFile);
        await runValidate(resolveValidateConfig(options, configFile));
      } catch (error) {
        reportFailure("validate", error);
      }
    });
}
