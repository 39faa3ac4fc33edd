/**
 * Log level resolution: --log-level, then config file, then LOG_LEVEL
 */

import type { TablelintConfig } from "../config/types.js";
import { isLogLevel, logger } from "../../utils/logger.js";

let levelFromCli = false;

export function applyCliLogLevel(level: unknown): void {
  if (isLogLevel(level)) {
    logger.setLevel(level);
    levelFromCli = true;
  }
}

export function applyConfigLogLevel(config: TablelintConfig): void {
  if (!levelFromCli && config.logLevel) {
    logger.setLevel(config.logLevel);
  }
}
