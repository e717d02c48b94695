/**
 * uisync library entry
 */

export * from './release';
export * from './errors';
export {
  resolveSyncConfig,
  normalizePayloadDir,
  parseTimeout,
  DEFAULT_PAYLOAD_DIR,
  DEFAULT_TIMEOUT_MS,
} from './config/sync-config';
export type { ConfigEnv, ResolveContext } from './config/sync-config';
export type { SyncCliOptions, SyncConfig } from './types/config';
export { handleSyncCommand, parseSyncArgs } from './commands/sync-command';
export type { ParsedSyncArgs, SyncCommandDeps, SyncCommandResult } from './commands/sync-command';
export { ConsoleReporter } from './commands/sync-reporter';
