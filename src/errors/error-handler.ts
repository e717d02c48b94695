/**
 * Error Handler
 *
 * Renders a failed run for the terminal and maps it to a process exit code.
 */

import { errorBox } from '../utils/ui';
import { EXIT_CODES, ExtractError, NetworkError, SyncError, toError, type ExitCode } from './sync-errors';

/**
 * Build the lines shown to the user for an error
 */
export function describeError(error: unknown, verbose = false): string[] {
  const err = toError(error);
  const lines = [err.message];

  if (err instanceof SyncError && err.stage) {
    lines.push(`Stage: ${err.stage}`);
  }
  if (err instanceof ExtractError && err.entryName) {
    lines.push(`Entry: ${err.entryName}`);
  }
  if (err instanceof NetworkError && err.url) {
    lines.push(`URL:   ${err.url}`);
  }
  if (verbose && err.stack) {
    lines.push('', err.stack);
  }
  return lines;
}

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof SyncError ? error.exitCode : EXIT_CODES.unknown;
}

/**
 * Print the error and return the exit code the process should end with
 */
export function handleError(error: unknown, verbose = false): ExitCode {
  const title = error instanceof SyncError ? error.name : 'Unexpected error';
  console.error(errorBox(describeError(error, verbose).join('\n'), title));
  return exitCodeFor(error);
}
