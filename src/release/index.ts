/**
 * Release Module - Barrel Export
 */

// Versions
export type { SemanticVersion, VersionOrdering } from './semver';
export {
  BASELINE_VERSION,
  stripVersionPrefix,
  parseVersion,
  parseVersionOrThrow,
  formatVersion,
  compareVersions,
  isNewerVersion,
} from './semver';

// Marker
export type { MarkerLoadResult } from './version-marker';
export { VERSION_MARKER_FILE, getMarkerPath, markerExists, loadMarker, saveMarker } from './version-marker';

// Extraction
export type { ArchiveEntry, ArchiveEntryType, ExtractSummary, ExtractOptions } from './tar-extractor';
export { extractTarGz, extractTarGzFile, resolveEntryPath } from './tar-extractor';

// Fetching
export type { ReleaseInfo, ReleaseSource, GitHubReleaseSourceOptions } from './release-source';
export {
  DEFAULT_REPO,
  GitHubReleaseSource,
  getLatestReleaseUrl,
  parseReleaseResponse,
} from './release-source';
export type { DownloadProgress, ProgressCallback, RequestConfig } from './downloader';
export { fetchJson, downloadFile, USER_AGENT } from './downloader';

// Relocation
export type { CopyDirectory } from './relocator';
export { copyDirectory, locatePayload } from './relocator';
export type { SpecInstallResult } from './spec-installer';
export { installSpec, DEFAULT_SPEC_URL } from './spec-installer';

// Orchestration
export type { SyncEvent, SyncEventLevel, SyncReporter, SyncStage } from './events';
export { silentReporter, RecordingReporter } from './events';
export type { SyncOrchestratorDeps, SyncRunOptions, SyncResult, SyncStatus } from './sync-orchestrator';
export { SyncOrchestrator, archiveFileName, STAGING_PREFIX, STAGING_RELEASE_DIR } from './sync-orchestrator';
