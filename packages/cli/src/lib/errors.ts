/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { BreakPropsError, EXIT_CODE } from "@breakprops/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.FAILURE;
  }
}

/**
 * Map errors to CLI exit codes
 * - 64: usage errors
 * - 65: property data errors
 * - 74: I/O errors
 * - 1: everything else
 */
export function mapErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return EXIT_CODE.USAGE;
  }

  if (error instanceof BreakPropsError) {
    switch (error.code) {
      case "E_PARSE":
      case "E_OVERLAP":
      case "E_CAPACITY":
      case "E_PACKED":
        return EXIT_CODE.DATA_ERROR;
      case "READ_ERROR":
      case "WRITE_ERROR":
        return EXIT_CODE.IO_ERROR;
    }
  }

  return EXIT_CODE.FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error.cause !== undefined) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      if (verbose || error instanceof BreakPropsError) {
        message += `\n  Cause: ${cause}`;
      }
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
