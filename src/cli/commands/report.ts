/**
 * Failure reporting shared by commands
 * Writes exactly one JSON error response to stderr and exits non-zero.
 */

import {
  ErrorCode,
  TablelintError,
  exitCodeFor,
} from "../../utils/errors.js";

export function toTablelintError(error: unknown): TablelintError {
  if (error instanceof TablelintError) {
    return error;
  }
  return new TablelintError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

export function reportFailure(phase: string, error: unknown): never {
  const failure = toTablelintError(error);
  console.error(JSON.stringify(failure.toResponse(phase), null, 2));
  process.exit(exitCodeFor(failure));
}
