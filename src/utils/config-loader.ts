/**
 * Configuration loader for the validate command
 */

import { dirname } from "path";
import type {
  TablelintConfig,
  ValidateCommandOptions,
  ValidateConfig,
} from "../cli/config/types.js";
import { isControlFile } from "../lib/schema-loader/index.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_VALIDATE_CONFIG: Omit<ValidateConfig, "schema"> = {
  dataDir: ".",
  extension: ".csv",
  delimiter: ",",
};

/**
 * Merge CLI options and config file into a complete validate configuration
 *
 * Precedence: CLI > config file > defaults. A control-file schema defaults
 * its data directory to the directory it lives in.
 *
 * @example
 * resolveValidateConfig(
 *   { schema: "db/schema.csv" },
 *   { validate: { delimiter: ";" } },
 * );
 * // Returns: { schema: "db/schema.csv", dataDir: "db", extension: ".csv", delimiter: ";" }
 */
export function resolveValidateConfig(
  cliOptions: ValidateCommandOptions = {},
  configFile: TablelintConfig = {},
): ValidateConfig {
  const section = configFile.validate ?? {};

  const schema = cliOptions.schema ?? section.schema;
  if (!schema) {
    throw new ConfigError("Missing schema path: pass --schema or set validate.schema");
  }

  const defaultDataDir = isControlFile(schema)
    ? dirname(schema)
    : DEFAULT_VALIDATE_CONFIG.dataDir;

  const config: ValidateConfig = {
    schema,
    dataDir: cliOptions.dataDir ?? section.dataDir ?? defaultDataDir,
    extension:
      cliOptions.extension ?? section.extension ?? DEFAULT_VALIDATE_CONFIG.extension,
    delimiter:
      cliOptions.delimiter ?? section.delimiter ?? DEFAULT_VALIDATE_CONFIG.delimiter,
  };

  validateValidateConfig(config);

  logger.debug("Validate config loaded", { ...config });

  return config;
}

/**
 * @throws ConfigError if configuration is invalid
 */
export function validateValidateConfig(config: ValidateConfig): void {
  validateDelimiter(config.delimiter);
  if (config.dataDir === "") {
    throw new ConfigError("Data directory must not be empty");
  }
}

/**
 * A field delimiter is one character other than a quote or line break
 *
 * @throws ConfigError
 */
export function validateDelimiter(delimiter: string): void {
  if (delimiter.length !== 1) {
    throw new ConfigError(`Delimiter must be a single character, got '${delimiter}'`);
  }
  if (delimiter === '"' || delimiter === "\n" || delimiter === "\r") {
    throw new ConfigError(`Delimiter cannot be a quote or newline character`);
  }
}
