/**
 * Release Source
 * Where the latest release comes from. The GitHub implementation reads the
 * releases API; tests supply an in-process implementation.
 */

import { NetworkError } from '../errors';
import { downloadFile, fetchJson, type ProgressCallback } from './downloader';

/** The subset of a release the sync needs */
export interface ReleaseInfo {
  /** Tag as published, e.g. "v5.17.14" */
  tagName: string;
  /** URL of the source tarball for the tag */
  tarballUrl: string;
}

export interface ReleaseSource {
  /** Human-readable origin, used in messages */
  readonly label: string;
  fetchLatestRelease(): Promise<ReleaseInfo>;
  downloadArchive(release: ReleaseInfo, destPath: string, onProgress?: ProgressCallback): Promise<void>;
}

export const DEFAULT_REPO = 'swagger-api/swagger-ui';

/** GitHub API URL for the latest release of owner/name */
export function getLatestReleaseUrl(repo: string): string {
  return `https://api.github.com/repos/${repo}/releases/latest`;
}

/**
 * Validate the release payload, keeping only tag_name and tarball_url
 */
export function parseReleaseResponse(body: unknown, url: string): ReleaseInfo {
  if (typeof body !== 'object' || body === null) {
    throw new NetworkError('Release response is not a JSON object', url);
  }

  const tagName: unknown = Reflect.get(body, 'tag_name');
  const tarballUrl: unknown = Reflect.get(body, 'tarball_url');
  if (typeof tagName !== 'string' || tagName === '') {
    throw new NetworkError('Release response has no tag_name', url);
  }
  if (typeof tarballUrl !== 'string' || tarballUrl === '') {
    throw new NetworkError('Release response has no tarball_url', url);
  }

  return { tagName, tarballUrl };
}

export interface GitHubReleaseSourceOptions {
  repo: string;
  /** Overrides the API URL derived from repo */
  releasesUrl?: string;
  timeoutMs: number;
}

export class GitHubReleaseSource implements ReleaseSource {
  readonly label: string;
  private readonly releasesUrl: string;

  constructor(private readonly options: GitHubReleaseSourceOptions) {
    this.releasesUrl = options.releasesUrl ?? getLatestReleaseUrl(options.repo);
    this.label = options.repo;
  }

  async fetchLatestRelease(): Promise<ReleaseInfo> {
    const body = await fetchJson(this.releasesUrl, { timeout: this.options.timeoutMs });
    return parseReleaseResponse(body, this.releasesUrl);
  }

  downloadArchive(
    release: ReleaseInfo,
    destPath: string,
    onProgress?: ProgressCallback
  ): Promise<void> {
    return downloadFile(release.tarballUrl, destPath, { timeout: this.options.timeoutMs }, onProgress);
  }
}
