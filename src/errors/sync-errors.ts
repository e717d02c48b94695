/**
 * Sync Error Taxonomy
 *
 * Every failure that ends a run is one of these classes. Each carries the
 * process exit code the CLI reports and, where known, the stage it came from.
 */

import type { SyncStage } from '../release/events';

/** Exit codes reported by the CLI */
export const EXIT_CODES = {
  success: 0,
  unknown: 1,
  usage: 2,
  parse: 3,
  network: 4,
  extract: 5,
  io: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Base class for all sync failures
 */
export class SyncError extends Error {
  stage?: SyncStage;

  constructor(
    message: string,
    public readonly exitCode: ExitCode = EXIT_CODES.unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SyncError';
  }

  /** Attach the stage that raised the error (first stage wins) */
  atStage(stage: SyncStage): this {
    this.stage ??= stage;
    return this;
  }
}

/** Malformed version text */
export class ParseError extends SyncError {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message, EXIT_CODES.parse);
    this.name = 'ParseError';
  }
}

/** Release metadata or archive could not be fetched */
export class NetworkError extends SyncError {
  readonly statusCode?: number;

  constructor(
    message: string,
    public readonly url?: string,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, EXIT_CODES.network, options);
    this.name = 'NetworkError';
    this.statusCode = options?.statusCode;
  }
}

/** Corrupt archive, unsafe entry path or unexpected archive layout */
export class ExtractError extends SyncError {
  constructor(
    message: string,
    public readonly entryName?: string,
    options?: { cause?: unknown }
  ) {
    super(message, EXIT_CODES.extract, options);
    this.name = 'ExtractError';
  }
}

/** Filesystem create/write/remove/copy failure */
export class IOError extends SyncError {
  constructor(
    message: string,
    public readonly filePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, EXIT_CODES.io, options);
    this.name = 'IOError';
  }
}

/** Invalid command-line arguments or configuration */
export class UsageError extends SyncError {
  constructor(message: string) {
    super(message, EXIT_CODES.usage);
    this.name = 'UsageError';
  }
}

/** Narrow an unknown thrown value to an Error */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** Error code of a Node.js system error, if any */
export function errnoCode(value: unknown): string | undefined {
  if (value instanceof Error && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}
