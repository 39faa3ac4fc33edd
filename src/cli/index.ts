#!/usr/bin/env node

/**
 * tablelint CLI - integrity constraints for directories of delimited files
 */

import { Command, InvalidArgumentError } from "commander";
import { createCheckCommand } from "./commands/check.js";
import { createValidateCommand } from "./commands/validate.js";
import { applyCliLogLevel } from "./commands/log-level.js";
import { reportFailure } from "./commands/report.js";
import { isLogLevel, type LogLevel } from "../utils/logger.js";

const pkg = {
  name: "tablelint",
  version: "0.1.0",
  description: "Offline schema linter for tabular data stored as delimited files",
};

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError("Expected one of: error, warn, info, debug");
  }
  return value;
}

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", parseLogLevel)
    .hook("preAction", (thisCommand) => {
      applyCliLogLevel(thisCommand.opts().logLevel);
    });

  program.addCommand(createCheckCommand());
  program.addCommand(createValidateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  reportFailure("cli", error);
});
