import { initUI, box, color, dim, header, subheader } from '../utils/ui';
import { DEFAULT_PAYLOAD_DIR, DEFAULT_TIMEOUT_MS } from '../config/sync-config';
import { DEFAULT_REPO } from '../release/release-source';
import { VERSION_MARKER_FILE } from '../release/version-marker';
import { CONFIG_ENV } from '../types/config';
import { getVersion } from '../utils/version';

/**
 * Print a section with aligned entries
 * Format:
 *   Title:
 *     --flag <value>    Description
 */
function printSection(title: string, items: [string, string][]): void {
  console.log(subheader(`${title}:`));

  const maxLen = Math.max(...items.map(([left]) => left.length));
  for (const [left, desc] of items) {
    console.log(`  ${color(left.padEnd(maxLen + 2), 'command')} ${desc}`);
  }

  console.log('');
}

/**
 * Display help information for uisync
 */
export async function handleHelpCommand(): Promise<void> {
  await initUI();

  console.log(
    box(`${header(`uisync v${getVersion()}`)}\n${dim('Keep a directory in sync with the latest Swagger UI release')}`, {
      padding: 1,
      borderStyle: 'round',
    })
  );
  console.log('');

  console.log(subheader('Usage:'));
  console.log(`  ${color('uisync [options]', 'command')}`);
  console.log('');

  printSection('Options', [
    ['-o, --out <dir>', 'Output directory (default: current directory)'],
    ['--repo <owner/name>', `GitHub repository (default: ${DEFAULT_REPO})`],
    ['--payload <dir>', `Release subdirectory to copy (default: ${DEFAULT_PAYLOAD_DIR})`],
    ['--spec <file>', 'Install an OpenAPI spec and point the UI at it'],
    ['--work-dir <dir>', 'Directory for the download and staging files (default: OS temp)'],
    ['--timeout <ms>', `HTTP timeout in milliseconds (default: ${DEFAULT_TIMEOUT_MS})`],
    ['-f, --force', 'Sync even when the recorded version is current'],
    ['--check', 'Only report whether an update is available'],
    ['--verbose', 'Print debug output to stderr'],
    ['-h, --help', 'Show this help'],
    ['-v, --version', 'Show version'],
  ]);

  printSection('Environment', [
    [CONFIG_ENV.out, 'Output directory'],
    [CONFIG_ENV.repo, 'GitHub repository'],
    [CONFIG_ENV.payload, 'Release subdirectory to copy'],
    [CONFIG_ENV.workDir, 'Download and staging directory'],
    [CONFIG_ENV.releasesUrl, 'Latest-release API URL'],
    [CONFIG_ENV.timeout, 'HTTP timeout in milliseconds'],
    [CONFIG_ENV.verbose, 'Set to 1 for debug output'],
  ]);

  console.log(subheader('Files:'));
  console.log(`  ${VERSION_MARKER_FILE.padEnd(22)} ${color('<out>/' + VERSION_MARKER_FILE, 'path')}`);
  console.log('');

  console.log(subheader('Exit codes:'));
  console.log(`  ${dim('0 ok  1 unexpected  2 usage  3 parse  4 network  5 extract  6 io')}`);
  console.log('');
}
