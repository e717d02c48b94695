export {
  EXIT_CODES,
  SyncError,
  ParseError,
  NetworkError,
  ExtractError,
  IOError,
  UsageError,
  toError,
  errnoCode,
} from './sync-errors';
export type { ExitCode } from './sync-errors';
export { handleError, describeError, exitCodeFor } from './error-handler';
