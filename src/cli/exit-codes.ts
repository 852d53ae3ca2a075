// ---------------------------------------------------------------------------
// Error -> exit code and one-line message.
// ---------------------------------------------------------------------------

import { InputValidationError, UsageError } from "../core/errors.js";

export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError || error instanceof InputValidationError) {
    return ExitCode.USAGE;
  }
  return ExitCode.FAILURE;
}

export function describeFailure(error: unknown): string {
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}
