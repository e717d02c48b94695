/**
 * Sync Command Handler
 *
 * uisync [--out <dir>] [--repo <owner/name>] [--payload <dir>] [--spec <file>]
 *        [--work-dir <dir>] [--timeout <ms>] [--force] [--check] [--verbose]
 */

import { resolveSyncConfig, type ResolveContext } from '../config/sync-config';
import { UsageError } from '../errors';
import { formatVersion } from '../release/semver';
import { GitHubReleaseSource, type ReleaseSource } from '../release/release-source';
import { SyncOrchestrator, type SyncResult } from '../release/sync-orchestrator';
import type { SyncCliOptions, SyncConfig } from '../types/config';
import { color, info, ok, warn } from '../utils/ui';
import { extractFlag, extractOption } from './arg-extractor';
import { runCommandWithContract, type CommandExecutionContract } from './command-execution-contract';
import { ConsoleReporter, type FlushableReporter } from './sync-reporter';

const VALUE_OPTIONS = {
  out: ['--out', '-o'],
  repo: ['--repo'],
  payload: ['--payload'],
  spec: ['--spec'],
  workDir: ['--work-dir'],
  timeout: ['--timeout'],
} as const;

type ValueOption = keyof typeof VALUE_OPTIONS;

export interface ParsedSyncArgs {
  options: SyncCliOptions;
  /** Value options given without a value */
  missingValues: string[];
  unknownArgs: string[];
}

export interface SyncCommandDeps {
  /** Builds the release source for a resolved config; defaults to GitHub */
  createSource?: (config: SyncConfig) => ReleaseSource;
  /** Builds the progress reporter; defaults to ConsoleReporter */
  createReporter?: (config: SyncConfig) => FlushableReporter;
  resolveContext?: ResolveContext;
}

export interface SyncCommandResult {
  config: SyncConfig;
  result: SyncResult;
}

export function parseSyncArgs(rawArgs: string[]): ParsedSyncArgs {
  let remaining = [...rawArgs];
  const values: Partial<Record<ValueOption, string>> = {};
  const missingValues: string[] = [];

  for (const [key, flags] of Object.entries(VALUE_OPTIONS)) {
    const extracted = extractOption(remaining, flags);
    remaining = extracted.remainingArgs;
    if (extracted.missingValue) {
      missingValues.push(flags[0]);
    } else if (extracted.value !== undefined && isValueOption(key)) {
      values[key] = extracted.value;
    }
  }

  const takeFlag = (flags: readonly string[]): boolean => {
    const extracted = extractFlag(remaining, flags);
    remaining = extracted.remainingArgs;
    return extracted.found;
  };
  const force = takeFlag(['--force', '-f']);
  const check = takeFlag(['--check']);
  const verbose = takeFlag(['--verbose']);

  return {
    options: { ...values, force, check, verbose },
    missingValues,
    unknownArgs: remaining,
  };
}

function isValueOption(key: string): key is ValueOption {
  return key in VALUE_OPTIONS;
}

export function createSyncContract(
  deps: SyncCommandDeps = {}
): CommandExecutionContract<ParsedSyncArgs, SyncCommandResult> {
  const createSource =
    deps.createSource ??
    ((config: SyncConfig) =>
      new GitHubReleaseSource({
        repo: config.repo,
        releasesUrl: config.releasesUrl,
        timeoutMs: config.timeoutMs,
      }));
  const createReporter =
    deps.createReporter ?? ((config: SyncConfig) => new ConsoleReporter({ verbose: config.verbose }));

  return {
    parse: parseSyncArgs,

    validate(parsed) {
      if (parsed.missingValues.length > 0) {
        throw new UsageError(`Missing value for ${parsed.missingValues.join(', ')}`);
      }
      if (parsed.unknownArgs.length > 0) {
        throw new UsageError(
          `Unknown argument${parsed.unknownArgs.length > 1 ? 's' : ''}: ${parsed.unknownArgs.join(' ')}`
        );
      }
      if (parsed.options.force && parsed.options.check) {
        throw new UsageError('--force and --check cannot be used together');
      }
    },

    async execute(parsed) {
      const config = resolveSyncConfig(parsed.options, deps.resolveContext);
      const reporter = createReporter(config);
      const orchestrator = new SyncOrchestrator({ source: createSource(config), reporter });

      let failed = false;
      try {
        const result = await orchestrator.run({
          outputDir: config.outputDir,
          workDir: config.workDir,
          payloadDir: config.payloadDir,
          specFile: config.specFile,
          force: config.force,
          checkOnly: config.checkOnly,
        });
        return { config, result };
      } catch (error) {
        failed = true;
        throw error;
      } finally {
        try {
          await reporter.flush();
        } catch (flushError) {
          // The run's own error is the one the exit code is derived from
          if (!failed) throw flushError;
          const message = flushError instanceof Error ? flushError.message : String(flushError);
          console.error(warn(`Progress output failed: ${message}`));
        }
      }
    },

    render({ config, result }) {
      const installed = formatVersion(result.previousVersion);
      const latest = formatVersion(result.remoteVersion);

      switch (result.status) {
        case 'update-available':
          console.log(info(`Update available: ${installed} -> ${latest} (${result.tagName})`));
          break;
        case 'up-to-date':
          // A full run already reported this through the orchestrator
          if (config.checkOnly) console.log(ok(`Up to date (${installed}, latest ${latest})`));
          break;
        case 'synced':
          if (result.extracted) {
            const { files, directories, skipped } = result.extracted;
            console.log(
              `    ${color(`${files} files, ${directories} directories, ${skipped} skipped`, 'dim')}`
            );
          }
          break;
      }
    },
  };
}

/**
 * Handle the sync command (the default command)
 */
export async function handleSyncCommand(
  rawArgs: string[],
  deps: SyncCommandDeps = {}
): Promise<SyncCommandResult> {
  const { result } = await runCommandWithContract(rawArgs, createSyncContract(deps));
  return result;
}
