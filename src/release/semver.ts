/**
 * Release Version Model
 *
 * Parses and orders `major.minor.patch` release tags. Components are kept as
 * their decimal text and compared as strings, position by position, so
 * "9" sorts after "10". Callers that need numeric semver ordering must not
 * use this module.
 */

import { ParseError } from '../errors';

export interface SemanticVersion {
  readonly major: string;
  readonly minor: string;
  readonly patch: string;
}

export type VersionOrdering = 'less' | 'equal' | 'greater';

/** Version assumed when the output directory has no usable marker */
export const BASELINE_VERSION: SemanticVersion = Object.freeze({
  major: '0',
  minor: '0',
  patch: '0',
});

const NUMERIC_COMPONENT = /^\d+$/;

/**
 * Remove surrounding whitespace and one leading non-digit marker ("v1.2.3" -> "1.2.3")
 */
export function stripVersionPrefix(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length > 0 && !/^\d/.test(trimmed)) {
    return trimmed.slice(1);
  }
  return trimmed;
}

/**
 * Parse a version string, returning null when any component is not a
 * non-negative integer. Missing components default to "0"; components past
 * the third do not take part in ordering.
 */
export function parseVersion(raw: string): SemanticVersion | null {
  const parts = stripVersionPrefix(raw).split('.');
  if (!parts.every((part) => NUMERIC_COMPONENT.test(part))) {
    return null;
  }

  const [major, minor = '0', patch = '0'] = parts;
  return { major, minor, patch };
}

/**
 * Parse a version string or throw ParseError
 */
export function parseVersionOrThrow(raw: string): SemanticVersion {
  const version = parseVersion(raw);
  if (!version) {
    throw new ParseError(`Invalid release version "${raw}"`, raw);
  }
  return version;
}

export function formatVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Compare component by component using string order of the numeric text
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): VersionOrdering {
  const left = [a.major, a.minor, a.patch];
  const right = [b.major, b.minor, b.patch];

  for (let i = 0; i < left.length; i++) {
    if (left[i] < right[i]) return 'less';
    if (left[i] > right[i]) return 'greater';
  }
  return 'equal';
}

/**
 * True when candidate orders after current
 */
export function isNewerVersion(current: SemanticVersion, candidate: SemanticVersion): boolean {
  return compareVersions(current, candidate) === 'less';
}
