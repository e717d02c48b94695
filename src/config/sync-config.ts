/**
 * Sync Configuration
 *
 * Resolves the settings for one run: CLI options first, then UISYNC_*
 * environment variables, then defaults. Invalid values raise UsageError.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { UsageError } from '../errors';
import { DEFAULT_REPO } from '../release/release-source';
import { CONFIG_ENV, type SyncCliOptions, type SyncConfig } from '../types/config';

export const DEFAULT_PAYLOAD_DIR = 'dist';
export const DEFAULT_TIMEOUT_MS = 60000;

const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;
const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

export interface ResolveContext {
  env?: ConfigEnv;
  cwd?: string;
}

function pick(cliValue: string | undefined, env: ConfigEnv, key: string): string | undefined {
  if (cliValue !== undefined) return cliValue;
  const envValue = env[key]?.trim();
  return envValue ? envValue : undefined;
}

export function isTruthy(value: string | undefined): boolean {
  return value !== undefined && TRUTHY_VALUES.has(value.trim().toLowerCase());
}

/**
 * Parse a timeout in milliseconds; only positive integers are accepted
 */
export function parseTimeout(raw: string): number {
  const text = raw.trim();
  if (!/^\d+$/.test(text) || Number(text) <= 0) {
    throw new UsageError(`Invalid timeout "${raw}": expected a positive number of milliseconds`);
  }
  return Number(text);
}

/**
 * Normalize the payload directory, which must stay inside the release root
 */
export function normalizePayloadDir(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === '') {
    throw new UsageError('Payload directory must not be empty');
  }
  if (path.isAbsolute(trimmed) || path.win32.isAbsolute(trimmed)) {
    throw new UsageError(`Payload directory "${raw}" must be relative to the release root`);
  }

  const normalized = path.posix.normalize(trimmed.replace(/\\/g, '/')).replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new UsageError(`Payload directory "${raw}" points outside the release`);
  }
  return normalized === '' ? '.' : normalized;
}

/** True when target is dir itself or lies beneath it */
export function isWithinDirectory(dir: string, target: string): boolean {
  const relative = path.relative(dir, target);
  return (
    relative === '' ||
    (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative))
  );
}

export function resolveSyncConfig(cli: SyncCliOptions, context: ResolveContext = {}): SyncConfig {
  const env = context.env ?? process.env;
  const cwd = context.cwd ?? process.cwd();

  const repo = pick(cli.repo, env, CONFIG_ENV.repo) ?? DEFAULT_REPO;
  if (!REPO_PATTERN.test(repo)) {
    throw new UsageError(`Invalid repository "${repo}": expected owner/name`);
  }

  const outDir = pick(cli.out, env, CONFIG_ENV.out) ?? '.';
  const workDir = pick(cli.workDir, env, CONFIG_ENV.workDir) ?? os.tmpdir();
  const payloadDir = normalizePayloadDir(
    pick(cli.payload, env, CONFIG_ENV.payload) ?? DEFAULT_PAYLOAD_DIR
  );

  const rawTimeout = pick(cli.timeout, env, CONFIG_ENV.timeout);
  const timeoutMs = rawTimeout === undefined ? DEFAULT_TIMEOUT_MS : parseTimeout(rawTimeout);

  let specFile: string | undefined;
  if (cli.spec !== undefined) {
    specFile = path.resolve(cwd, cli.spec);
    if (!fs.existsSync(specFile) || !fs.statSync(specFile).isFile()) {
      throw new UsageError(`Spec file not found: ${cli.spec}`);
    }
  }

  const outputDir = path.resolve(cwd, outDir);
  const resolvedWorkDir = path.resolve(cwd, workDir);
  if (isWithinDirectory(outputDir, resolvedWorkDir)) {
    throw new UsageError(
      `Work directory ${resolvedWorkDir} must be outside the output directory ${outputDir}; choose another --work-dir`
    );
  }

  const releasesUrl = pick(undefined, env, CONFIG_ENV.releasesUrl);

  return {
    outputDir,
    repo,
    payloadDir,
    workDir: resolvedWorkDir,
    ...(releasesUrl ? { releasesUrl } : {}),
    ...(specFile ? { specFile } : {}),
    timeoutMs,
    force: cli.force,
    checkOnly: cli.check,
    verbose: cli.verbose || isTruthy(env[CONFIG_ENV.verbose]),
  };
}
