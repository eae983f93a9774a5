/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { EmptyIndexInputError, MalformedIdentifierError } from "@seriesindex/sdk";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_EMPTY_INDEX = 2;
export const EXIT_MALFORMED_ID = 3;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success (help, version)
 * - 1: usage/query/IO/unknown error
 * - 2: no series to build the index from
 * - 3: malformed series id in the source
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof EmptyIndexInputError) {
    return EXIT_EMPTY_INDEX;
  }

  if (error instanceof MalformedIdentifierError) {
    return EXIT_MALFORMED_ID;
  }

  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
