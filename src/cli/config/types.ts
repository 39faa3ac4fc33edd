/**
 * CLI configuration types
 */

import type { LogLevel } from "../../utils/logger.js";

/**
 * Validate command configuration
 */
export interface ValidateConfig {
  /** Schema document (.json/.yaml/.yml) or control file (.csv) */
  schema: string;
  /** Directory holding one data file per table */
  dataDir: string;
  /** Appended to table names to form file names */
  extension: string;
  delimiter: string;
}

/**
 * Complete configuration file structure
 */
export interface TablelintConfig {
  logLevel?: LogLevel;
  validate?: Partial<ValidateConfig>;
}

/**
 * CLI command options (from commander)
 */
export interface CheckCommandOptions {
  schema?: string;
  delimiter?: string;
  config?: string;
}

export interface ValidateCommandOptions {
  schema?: string;
  dataDir?: string;
  extension?: string;
  delimiter?: string;
  config?: string;
}
