/**
 * CLI error handling and exit code mapping
 */

import {
  IntegrityError,
  LockTimeoutError,
  NotFoundError,
  UnsupportedVersionError,
} from "@dealbook/sdk";

export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;
export const EXIT_LOCKED = 3;
export const EXIT_INTEGRITY = 4;

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
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/config/IO/unknown error
 * - 2: record or file not found
 * - 3: lock could not be acquired
 * - 4: integrity or schema version failure
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof NotFoundError) {
    return EXIT_NOT_FOUND;
  }
  if (error instanceof LockTimeoutError) {
    return EXIT_LOCKED;
  }
  if (error instanceof IntegrityError || error instanceof UnsupportedVersionError) {
    return EXIT_INTEGRITY;
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
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
