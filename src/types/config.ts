/**
 * uisync Configuration Types
 */

/**
 * Options as given on the command line (unvalidated, unresolved)
 */
export interface SyncCliOptions {
  out?: string;
  repo?: string;
  payload?: string;
  workDir?: string;
  spec?: string;
  timeout?: string;
  force: boolean;
  check: boolean;
  verbose: boolean;
}

/**
 * Fully resolved configuration for one run
 */
export interface SyncConfig {
  /** Absolute directory receiving the payload and the version marker */
  outputDir: string;
  /** GitHub repository as owner/name */
  repo: string;
  /** Subdirectory of the release to copy ("." for the whole release) */
  payloadDir: string;
  /** Absolute parent directory for the download and staging area */
  workDir: string;
  /** Overrides the releases API URL derived from repo */
  releasesUrl?: string;
  /** Absolute path of an OpenAPI spec to install next to the payload */
  specFile?: string;
  timeoutMs: number;
  force: boolean;
  checkOnly: boolean;
  verbose: boolean;
}

/** Environment variables read by the config resolver */
export const CONFIG_ENV = {
  out: 'UISYNC_OUT',
  repo: 'UISYNC_REPO',
  payload: 'UISYNC_PAYLOAD',
  workDir: 'UISYNC_WORK_DIR',
  releasesUrl: 'UISYNC_RELEASES_URL',
  timeout: 'UISYNC_TIMEOUT',
  verbose: 'UISYNC_VERBOSE',
} as const;
