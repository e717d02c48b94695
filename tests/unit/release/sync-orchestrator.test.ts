import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RecordingReporter, type SyncStage } from '../../../src/release/events';
import {
  archiveFileName,
  STAGING_PREFIX,
  SyncOrchestrator,
  type SyncRunOptions,
} from '../../../src/release/sync-orchestrator';
import { getMarkerPath, saveMarker } from '../../../src/release/version-marker';
import { parseVersionOrThrow } from '../../../src/release/semver';
import { DEFAULT_SPEC_URL } from '../../../src/release/spec-installer';
import { ExtractError, IOError, NetworkError, ParseError } from '../../../src/errors';
import { FakeReleaseSource } from '../../helpers/fake-release-source';
import { buildTarGz, captureRejection, type TarEntry } from '../../helpers/tar-builder';

const ROOT = 'acme-widget-ui-abc1234';

function releaseArchive(extra: TarEntry[] = []): Buffer {
  return buildTarGz([
    { name: `${ROOT}/` },
    { name: `${ROOT}/dist/` },
    { name: `${ROOT}/dist/index.html`, content: '<html>ui</html>' },
    {
      name: `${ROOT}/dist/swagger-initializer.js`,
      content: `SwaggerUIBundle({ url: "${DEFAULT_SPEC_URL}" });\n`,
    },
    { name: `${ROOT}/src/core.js`, content: 'source' },
    ...extra,
  ]);
}

/** Stages in order, with consecutive repeats collapsed */
function stageFlow(reporter: RecordingReporter): SyncStage[] {
  return reporter.stages().filter((stage, i, all) => i === 0 || all[i - 1] !== stage);
}

function readMarker(dir: string): string {
  return fs.readFileSync(getMarkerPath(dir), 'utf8');
}

describe('SyncOrchestrator', () => {
  let tempDir: string;
  let outputDir: string;
  let workDir: string;
  let reporter: RecordingReporter;
  let options: SyncRunOptions;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uisync-orchestrator-'));
    outputDir = path.join(tempDir, 'out');
    workDir = path.join(tempDir, 'work');
    reporter = new RecordingReporter();
    options = { outputDir, workDir, payloadDir: 'dist' };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('syncs a newer release over the baseline marker', async () => {
    saveMarker(outputDir, parseVersionOrThrow('0.0.0'));
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    const result = await new SyncOrchestrator({ source, reporter }).run(options);

    expect(result.status).toBe('synced');
    expect(result.tagName).toBe('v1.2.3');
    expect(result.previousVersion).toEqual({ major: '0', minor: '0', patch: '0' });
    expect(result.remoteVersion).toEqual({ major: '1', minor: '2', patch: '3' });
    expect(result.extracted).toEqual({ directories: 2, files: 3, skipped: 0, bytes: 94 });
    expect(readMarker(outputDir)).toBe('version: 1.2.3\n');
    expect(fs.readdirSync(outputDir).sort()).toEqual([
      '.uisync-version.yml',
      'index.html',
      'swagger-initializer.js',
    ]);
    expect(fs.readFileSync(path.join(outputDir, 'index.html'), 'utf8')).toBe('<html>ui</html>');
    expect(fs.existsSync(workDir)).toBe(false);
    expect(stageFlow(reporter)).toEqual([
      'check-marker',
      'compare-versions',
      'download',
      'extract',
      'relocate',
      'record-version',
      'cleanup',
      'done',
    ]);
  });

  it('starts from the baseline when the output directory is new', async () => {
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    const result = await new SyncOrchestrator({ source, reporter }).run(options);

    expect(result.status).toBe('synced');
    expect(result.previousVersion).toEqual({ major: '0', minor: '0', patch: '0' });
    expect(readMarker(outputDir)).toBe('version: 1.2.3\n');
  });

  it('does not download when the recorded version is newer', async () => {
    saveMarker(outputDir, parseVersionOrThrow('2.0.0'));
    const source = new FakeReleaseSource({ tagName: 'v1.9.9', archive: releaseArchive() });

    const result = await new SyncOrchestrator({ source, reporter }).run(options);

    expect(result.status).toBe('up-to-date');
    expect(source.downloads).toBe(0);
    expect(fs.existsSync(workDir)).toBe(false);
    expect(readMarker(outputDir)).toBe('version: 2.0.0\n');
    expect(stageFlow(reporter)).toEqual(['check-marker', 'compare-versions', 'up-to-date']);
    expect(reporter.events[reporter.events.length - 1]).toEqual({
      stage: 'up-to-date',
      level: 'success',
      message: 'Already up to date (2.0.0)',
    });
  });

  it('syncs once and is up to date on the second run', async () => {
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });
    const orchestrator = new SyncOrchestrator({ source, reporter });

    const first = await orchestrator.run(options);
    const markerStat = fs.statSync(getMarkerPath(outputDir));
    const second = await orchestrator.run(options);

    expect(first.status).toBe('synced');
    expect(second.status).toBe('up-to-date');
    expect(source.downloads).toBe(1);
    expect(fs.statSync(getMarkerPath(outputDir)).mtimeMs).toBe(markerStat.mtimeMs);
  });

  it('proceeds from the baseline when the marker is corrupt', async () => {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(getMarkerPath(outputDir), 'version: banana\n');
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    const result = await new SyncOrchestrator({ source, reporter }).run(options);

    expect(result.status).toBe('synced');
    expect(readMarker(outputDir)).toBe('version: 1.2.3\n');
    expect(reporter.events[0]).toEqual({
      stage: 'check-marker',
      level: 'warn',
      message: 'Ignoring version marker: Marker version "banana" is not a valid version',
    });
  });

  it('rejects an archive with two top-level entries and keeps the marker', async () => {
    saveMarker(outputDir, parseVersionOrThrow('1.0.0'));
    const source = new FakeReleaseSource({
      tagName: 'v1.2.3',
      archive: buildTarGz([{ name: 'one/' }, { name: 'one/dist/' }, { name: 'two/' }]),
    });

    const error = await captureRejection(new SyncOrchestrator({ source, reporter }).run(options));

    expect(error).toBeInstanceOf(ExtractError);
    if (error instanceof ExtractError) {
      expect(error.stage).toBe('relocate');
      expect(error.exitCode).toBe(5);
    }
    expect(readMarker(outputDir)).toBe('version: 1.0.0\n');
    expect(fs.existsSync(workDir)).toBe(false);
    expect(reporter.events[reporter.events.length - 1]).toEqual({
      stage: 'failed',
      level: 'error',
      message: 'Expected exactly one top-level directory in the archive, found 2: one, two',
    });
  });

  it('fails with ParseError on an unparseable release tag', async () => {
    const source = new FakeReleaseSource({ tagName: 'nightly', archive: releaseArchive() });

    const error = await captureRejection(new SyncOrchestrator({ source, reporter }).run(options));

    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.stage).toBe('compare-versions');
    }
    expect(source.downloads).toBe(0);
    expect(fs.existsSync(getMarkerPath(outputDir))).toBe(false);
  });

  it('wraps metadata failures as NetworkError', async () => {
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', fetchError: new Error('socket hang up') });

    const error = await captureRejection(new SyncOrchestrator({ source, reporter }).run(options));

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.message).toBe('compare-versions failed: socket hang up');
      expect(error.stage).toBe('compare-versions');
    }
  });

  it('removes the partial download when the download fails', async () => {
    const source = new FakeReleaseSource({
      tagName: 'v1.2.3',
      archive: releaseArchive(),
      downloadError: new NetworkError('HTTP 502: Bad Gateway', 'https://example.test/tarball'),
    });

    const error = await captureRejection(new SyncOrchestrator({ source, reporter }).run(options));

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.message).toBe('HTTP 502: Bad Gateway');
      expect(error.stage).toBe('download');
    }
    expect(source.downloadedTo).toHaveLength(1);
    const [archivePath] = source.downloadedTo;
    expect(path.basename(archivePath)).toBe(archiveFileName(source.label, 'v1.2.3'));
    expect(path.dirname(path.dirname(archivePath))).toBe(workDir);
    expect(path.basename(path.dirname(archivePath)).startsWith(STAGING_PREFIX)).toBe(true);
    expect(fs.existsSync(workDir)).toBe(false);
    expect(stageFlow(reporter)).toEqual([
      'check-marker',
      'compare-versions',
      'download',
      'cleanup',
      'failed',
    ]);
  });

  it('never writes through a file planted at the archive name in the work directory', async () => {
    fs.mkdirSync(workDir, { recursive: true });
    const victim = path.join(tempDir, 'victim.txt');
    fs.writeFileSync(victim, 'precious');
    const planted = path.join(workDir, archiveFileName('acme/widget-ui', 'v1.2.3'));
    fs.symlinkSync(victim, planted);
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    const result = await new SyncOrchestrator({ source, reporter }).run(options);

    expect(result.status).toBe('synced');
    expect(fs.readFileSync(victim, 'utf8')).toBe('precious');
    expect(source.downloadedTo[0]).not.toBe(planted);
    expect(fs.readdirSync(workDir)).toEqual([path.basename(planted)]);
  });

  it('keeps a work directory it did not create', async () => {
    fs.mkdirSync(workDir, { recursive: true });
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    await new SyncOrchestrator({ source, reporter }).run(options);

    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('removes work directories it created, including missing parents', async () => {
    const nestedWorkDir = path.join(tempDir, 'cache', 'uisync');
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    await new SyncOrchestrator({ source, reporter }).run({ ...options, workDir: nestedWorkDir });

    expect(fs.existsSync(path.join(tempDir, 'cache'))).toBe(false);
  });

  it('reports a corrupt archive as ExtractError at the extract stage', async () => {
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: Buffer.from('not an archive') });

    const error = await captureRejection(new SyncOrchestrator({ source, reporter }).run(options));

    expect(error).toBeInstanceOf(ExtractError);
    if (error instanceof ExtractError) {
      expect(error.stage).toBe('extract');
    }
    expect(fs.existsSync(workDir)).toBe(false);
  });

  it('wraps copy failures as IOError', async () => {
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });
    const copyDirectory = () => {
      throw new Error('disk full');
    };

    const error = await captureRejection(
      new SyncOrchestrator({ source, reporter, copyDirectory }).run(options)
    );

    expect(error).toBeInstanceOf(IOError);
    if (error instanceof IOError) {
      expect(error.message).toBe('relocate failed: disk full');
      expect(error.stage).toBe('relocate');
    }
    expect(fs.existsSync(getMarkerPath(outputDir))).toBe(false);
  });

  it('only compares versions in check mode', async () => {
    saveMarker(outputDir, parseVersionOrThrow('1.0.0'));
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    const result = await new SyncOrchestrator({ source, reporter }).run({ ...options, checkOnly: true });

    expect(result.status).toBe('update-available');
    expect(source.downloads).toBe(0);
    expect(readMarker(outputDir)).toBe('version: 1.0.0\n');
  });

  it('syncs the same version again with force', async () => {
    saveMarker(outputDir, parseVersionOrThrow('1.2.3'));
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    const result = await new SyncOrchestrator({ source, reporter }).run({ ...options, force: true });

    expect(result.status).toBe('synced');
    expect(source.downloads).toBe(1);
    expect(fs.existsSync(path.join(outputDir, 'index.html'))).toBe(true);
  });

  it('copies the whole release root for payload "."', async () => {
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    await new SyncOrchestrator({ source, reporter }).run({ ...options, payloadDir: '.' });

    expect(fs.readdirSync(outputDir).sort()).toEqual(['.uisync-version.yml', 'dist', 'src']);
  });

  it('installs a spec file after relocating', async () => {
    const specFile = path.join(tempDir, 'petstore-local.json');
    fs.writeFileSync(specFile, '{"openapi":"3.0.0"}');
    const source = new FakeReleaseSource({ tagName: 'v1.2.3', archive: releaseArchive() });

    await new SyncOrchestrator({ source, reporter }).run({ ...options, specFile });

    expect(fs.readFileSync(path.join(outputDir, 'petstore-local.json'), 'utf8')).toBe(
      '{"openapi":"3.0.0"}'
    );
    expect(fs.readFileSync(path.join(outputDir, 'swagger-initializer.js'), 'utf8')).toBe(
      'SwaggerUIBundle({ url: "./petstore-local.json" });\n'
    );
    expect(stageFlow(reporter)).toContain('install-spec');
  });

  describe('archiveFileName', () => {
    it('combines the repository name and tag', () => {
      expect(archiveFileName('swagger-api/swagger-ui', 'v5.17.14')).toBe('swagger-ui_v5.17.14.tar.gz');
    });

    it('replaces characters unsafe in file names', () => {
      expect(archiveFileName('acme/ui', 'release/1 2')).toBe('ui_release_1_2.tar.gz');
    });
  });
});
