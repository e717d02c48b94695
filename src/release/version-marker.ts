/**
 * Version Marker
 * Reads/writes the record of the last fully synced release in the output directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { IOError, errnoCode, toError } from '../errors';
import { formatVersion, parseVersion, type SemanticVersion } from './semver';

export const VERSION_MARKER_FILE = '.uisync-version.yml';

export type MarkerLoadResult =
  | { status: 'found'; version: SemanticVersion }
  | { status: 'not-found' }
  | { status: 'corrupt'; reason: string };

/**
 * Get path to the marker file inside an output directory
 */
export function getMarkerPath(outputDir: string): string {
  return path.join(outputDir, VERSION_MARKER_FILE);
}

export function markerExists(outputDir: string): boolean {
  return fs.existsSync(getMarkerPath(outputDir));
}

/**
 * Load the recorded version. Missing and unreadable markers are reported, not thrown.
 */
export function loadMarker(outputDir: string): MarkerLoadResult {
  const markerPath = getMarkerPath(outputDir);

  let content: string;
  try {
    content = fs.readFileSync(markerPath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return { status: 'not-found' };
    }
    return { status: 'corrupt', reason: `Cannot read marker: ${toError(error).message}` };
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    return { status: 'corrupt', reason: `Invalid YAML: ${toError(error).message}` };
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { status: 'corrupt', reason: 'Marker is not a key-value record' };
  }

  const raw: unknown = Reflect.get(data, 'version');
  if (typeof raw !== 'string') {
    return { status: 'corrupt', reason: 'Marker has no "version" string' };
  }

  const version = parseVersion(raw);
  if (!version) {
    return { status: 'corrupt', reason: `Marker version "${raw}" is not a valid version` };
  }

  return { status: 'found', version };
}

/**
 * Write the marker, replacing any previous one.
 * Written to a sibling temp file first and renamed into place.
 */
export function saveMarker(outputDir: string, version: SemanticVersion): void {
  const markerPath = getMarkerPath(outputDir);
  const tmpPath = `${markerPath}.${process.pid}.tmp`;
  const content = yaml.dump({ version: formatVersion(version) });

  try {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(tmpPath, content, 'utf8');
    fs.renameSync(tmpPath, markerPath);
  } catch (error) {
    if (fs.existsSync(tmpPath)) fs.rmSync(tmpPath, { force: true });
    throw new IOError(`Failed to write version marker: ${toError(error).message}`, markerPath, {
      cause: error,
    });
  }
}
