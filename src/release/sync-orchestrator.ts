/**
 * Sync Orchestrator
 *
 * Runs one sync of an output directory against the latest release:
 *
 *   check-marker -> compare-versions -> up-to-date
 *                                    -> download -> extract -> relocate
 *                                       -> install-spec -> record-version -> cleanup
 *
 * Any stage failure ends the run with its typed error; the marker is written
 * only after every earlier stage succeeded, and staging files are removed on
 * every path.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  EXIT_CODES,
  IOError,
  NetworkError,
  SyncError,
  toError,
} from '../errors';
import { silentReporter, type SyncEventLevel, type SyncReporter, type SyncStage } from './events';
import type { ReleaseInfo, ReleaseSource } from './release-source';
import { copyDirectory as defaultCopyDirectory, locatePayload, type CopyDirectory } from './relocator';
import {
  BASELINE_VERSION,
  formatVersion,
  isNewerVersion,
  parseVersionOrThrow,
  type SemanticVersion,
} from './semver';
import { installSpec } from './spec-installer';
import { extractTarGzFile, type ExtractSummary } from './tar-extractor';
import { loadMarker, saveMarker } from './version-marker';

export const STAGING_PREFIX = '.uisync-staging-';

/** Extraction target inside the per-run staging directory */
export const STAGING_RELEASE_DIR = 'release';

export interface SyncOrchestratorDeps {
  source: ReleaseSource;
  reporter?: SyncReporter;
  copyDirectory?: CopyDirectory;
}

export interface SyncRunOptions {
  outputDir: string;
  /** Parent of the per-run staging directory; created when missing and removed again */
  workDir: string;
  /** Subdirectory of the release root to copy; "." copies everything */
  payloadDir: string;
  specFile?: string;
  /** Sync even when the recorded version is not older */
  force?: boolean;
  /** Stop after comparing versions */
  checkOnly?: boolean;
}

export type SyncStatus = 'up-to-date' | 'update-available' | 'synced';

export interface SyncResult {
  status: SyncStatus;
  previousVersion: SemanticVersion;
  remoteVersion: SemanticVersion;
  tagName: string;
  outputDir: string;
  /** Present when status is 'synced' */
  extracted?: ExtractSummary;
}

const NETWORK_STAGES: ReadonlySet<SyncStage> = new Set(['compare-versions', 'download']);

/**
 * File name for the downloaded tarball, e.g. "swagger-ui_v5.17.14.tar.gz"
 */
export function archiveFileName(sourceLabel: string, tagName: string): string {
  const name = sourceLabel.split('/').pop() || 'release';
  const safe = (text: string) => text.replace(/[^A-Za-z0-9._-]/g, '_');
  return `${safe(name)}_${safe(tagName)}.tar.gz`;
}

export class SyncOrchestrator {
  private readonly source: ReleaseSource;
  private readonly reporter: SyncReporter;
  private readonly copyDirectory: CopyDirectory;

  constructor(deps: SyncOrchestratorDeps) {
    this.source = deps.source;
    this.reporter = deps.reporter ?? silentReporter;
    this.copyDirectory = deps.copyDirectory ?? defaultCopyDirectory;
  }

  /**
   * Run one sync. Rejects with a SyncError subclass when any stage fails.
   */
  async run(options: SyncRunOptions): Promise<SyncResult> {
    try {
      return await this.execute(options);
    } catch (error) {
      const err =
        error instanceof SyncError
          ? error
          : new SyncError(toError(error).message, EXIT_CODES.unknown, { cause: error });
      this.emit('failed', 'error', err.message);
      throw err;
    }
  }

  private async execute(options: SyncRunOptions): Promise<SyncResult> {
    const outputDir = path.resolve(options.outputDir);
    const previousVersion = this.checkMarker(outputDir);

    this.emit('compare-versions', 'debug', `Fetching latest release of ${this.source.label}`);
    const release = await this.stage('compare-versions', () => this.source.fetchLatestRelease());
    const remoteVersion = this.stageSync('compare-versions', () =>
      parseVersionOrThrow(release.tagName)
    );
    const newer = isNewerVersion(previousVersion, remoteVersion);
    this.emit(
      'compare-versions',
      'info',
      `Installed ${formatVersion(previousVersion)}, latest ${formatVersion(remoteVersion)}`
    );

    const base = {
      previousVersion,
      remoteVersion,
      tagName: release.tagName,
      outputDir,
    };

    if (options.checkOnly) {
      return { ...base, status: newer ? 'update-available' : 'up-to-date' };
    }

    if (!newer && !options.force) {
      this.emit('up-to-date', 'success', `Already up to date (${formatVersion(previousVersion)})`);
      return { ...base, status: 'up-to-date' };
    }

    const extracted = await this.syncRelease(release, remoteVersion, outputDir, options);
    this.emit('done', 'success', `Synced ${release.tagName} into ${outputDir}`);
    return { ...base, status: 'synced', extracted };
  }

  private checkMarker(outputDir: string): SemanticVersion {
    const marker = loadMarker(outputDir);

    switch (marker.status) {
      case 'found':
        this.emit('check-marker', 'debug', `Recorded version ${formatVersion(marker.version)}`);
        return marker.version;
      case 'not-found':
        this.emit('check-marker', 'debug', 'No version marker, starting from 0.0.0');
        return BASELINE_VERSION;
      case 'corrupt':
        this.emit('check-marker', 'warn', `Ignoring version marker: ${marker.reason}`);
        return BASELINE_VERSION;
    }
  }

  /**
   * download -> extract -> relocate -> install-spec -> record-version,
   * with staging removal in a single finalizer
   */
  private async syncRelease(
    release: ReleaseInfo,
    remoteVersion: SemanticVersion,
    outputDir: string,
    options: SyncRunOptions
  ): Promise<ExtractSummary> {
    const workDir = path.resolve(options.workDir);
    const temporary: string[] = [];

    try {
      // One private directory per run holds the archive and the extracted tree
      const runDir = this.stageSync('download', () => {
        const createdWorkDir = fs.mkdirSync(workDir, { recursive: true });
        if (createdWorkDir) temporary.push(createdWorkDir);
        const dir = fs.mkdtempSync(path.join(workDir, STAGING_PREFIX));
        temporary.unshift(dir);
        return dir;
      });
      const archivePath = path.join(runDir, archiveFileName(this.source.label, release.tagName));
      const stagingDir = path.join(runDir, STAGING_RELEASE_DIR);

      this.emit('download', 'info', `Downloading ${release.tagName}`);
      await this.stage('download', async () => {
        let reported = 0;
        await this.source.downloadArchive(release, archivePath, (progress) => {
          if (progress.percentage >= reported + 25) {
            reported = progress.percentage - (progress.percentage % 25);
            this.emit('download', 'debug', `Downloaded ${progress.percentage}%`);
          }
        });
      });

      this.emit('extract', 'info', 'Extracting archive');
      const extracted = await this.stage('extract', () =>
        extractTarGzFile(archivePath, stagingDir, {
          onEntry: (entry) => this.emit('extract', 'debug', `${entry.type}: ${entry.path}`),
        })
      );

      this.emit('relocate', 'info', `Copying ${options.payloadDir} to ${outputDir}`);
      this.stageSync('relocate', () => {
        const payload = locatePayload(stagingDir, options.payloadDir);
        this.copyDirectory(payload, outputDir);
      });

      const specFile = options.specFile;
      if (specFile) {
        const installed = this.stageSync('install-spec', () => installSpec(specFile, outputDir));
        if (installed.patchedFile) {
          this.emit('install-spec', 'info', `Pointed ${path.basename(installed.patchedFile)} at ${path.basename(installed.specPath)}`);
        } else {
          this.emit('install-spec', 'warn', 'No Swagger UI initializer found; spec copied without rewiring');
        }
      }

      this.stageSync('record-version', () => saveMarker(outputDir, remoteVersion));
      this.emit('record-version', 'debug', `Recorded version ${formatVersion(remoteVersion)}`);
      return extracted;
    } finally {
      this.cleanup(temporary);
    }
  }

  /** Remove temporary files, innermost first; failures are reported, never thrown */
  private cleanup(paths: string[]): void {
    for (const target of paths) {
      try {
        fs.rmSync(target, { recursive: true, force: true });
      } catch (error) {
        this.emit('cleanup', 'warn', `Could not remove ${target}: ${toError(error).message}`);
      }
    }
    if (paths.length > 0) {
      this.emit('cleanup', 'debug', 'Removed temporary files');
    }
  }

  private async stage<T>(stage: SyncStage, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw this.classify(stage, error);
    }
  }

  private stageSync<T>(stage: SyncStage, action: () => T): T {
    try {
      return action();
    } catch (error) {
      throw this.classify(stage, error);
    }
  }

  private classify(stage: SyncStage, error: unknown): SyncError {
    if (error instanceof SyncError) return error.atStage(stage);

    const message = `${stage} failed: ${toError(error).message}`;
    const wrapped = NETWORK_STAGES.has(stage)
      ? new NetworkError(message, undefined, { cause: error })
      : new IOError(message, undefined, { cause: error });
    return wrapped.atStage(stage);
  }

  private emit(stage: SyncStage, level: SyncEventLevel, message: string): void {
    this.reporter.emit({ stage, level, message });
  }
}
