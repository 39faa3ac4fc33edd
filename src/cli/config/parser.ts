/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { TablelintConfig, ValidateConfig } from "./types.js";
import { isLogLevel, logger } from "../../utils/logger.js";
import { ConfigError } from "../../utils/errors.js";

const VALIDATE_KEYS: readonly (keyof ValidateConfig)[] = [
  "schema",
  "dataDir",
  "extension",
  "delimiter",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check a decoded config value has the expected shape
 *
 * @throws ConfigError naming the offending key
 */
export function toConfig(value: unknown, filePath: string): TablelintConfig {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Config file must contain an object: ${filePath}`);
  }

  const config: TablelintConfig = {};

  if (value.logLevel !== undefined) {
    if (!isLogLevel(value.logLevel)) {
      throw new ConfigError(
        `Invalid logLevel in ${filePath}: ${String(value.logLevel)}`,
      );
    }
    config.logLevel = value.logLevel;
  }

  if (value.validate !== undefined) {
    const section = value.validate;
    if (!isRecord(section)) {
      throw new ConfigError(`Config section 'validate' must be an object: ${filePath}`);
    }
    const validate: Partial<ValidateConfig> = {};
    for (const key of VALIDATE_KEYS) {
      const entry = section[key];
      if (entry === undefined) continue;
      if (typeof entry !== "string") {
        throw new ConfigError(`Config key 'validate.${key}' must be a string: ${filePath}`);
      }
      validate[key] = entry;
    }
    config.validate = validate;
  }

  return config;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): TablelintConfig {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let decoded: unknown;
  try {
    decoded = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = toConfig(decoded, filePath);
  logger.info("Configuration file parsed successfully", {
    hasValidateConfig: !!config.validate,
  });
  return config;
}
