/**
 * Version Command Handler
 *
 * Handle --version command for uisync.
 */

import { initUI, header, subheader, color, warn } from '../utils/ui';
import { resolveSyncConfig, type ResolveContext } from '../config/sync-config';
import { formatVersion } from '../release/semver';
import { getMarkerPath, loadMarker } from '../release/version-marker';
import { getVersion } from '../utils/version';
import { parseSyncArgs } from './sync-command';

/**
 * Handle version command. Also shows the release recorded in the output
 * directory, taken from --out or UISYNC_OUT like a sync would.
 */
export async function handleVersionCommand(
  rawArgs: string[] = [],
  context?: ResolveContext
): Promise<void> {
  await initUI();
  console.log(header(`uisync v${getVersion()}`));
  console.log('');

  const config = resolveSyncConfig(parseSyncArgs(rawArgs).options, context);

  console.log(subheader('Installation:'));
  console.log(`  ${color('Location:'.padEnd(17), 'info')} ${process.argv[1] || '(not found)'}`);
  console.log(`  ${color('Repository:'.padEnd(17), 'info')} ${config.repo}`);
  console.log(`  ${color('Output:'.padEnd(17), 'info')} ${config.outputDir}`);
  console.log(`  ${color('Marker:'.padEnd(17), 'info')} ${getMarkerPath(config.outputDir)}`);

  const marker = loadMarker(config.outputDir);
  switch (marker.status) {
    case 'found':
      console.log(`  ${color('Synced release:'.padEnd(17), 'info')} ${formatVersion(marker.version)}`);
      break;
    case 'not-found':
      console.log(`  ${color('Synced release:'.padEnd(17), 'info')} none`);
      break;
    case 'corrupt':
      console.log(warn(`Version marker unreadable: ${marker.reason}`));
      break;
  }

  console.log('');
  console.log(`${subheader('License:')} MIT`);
  console.log('');
}
