#!/usr/bin/env node
import { initUI } from './utils/ui';
import { handleError } from './errors';
import { hasAnyFlag } from './commands/arg-extractor';
import { handleHelpCommand } from './commands/help-command';
import { handleSyncCommand } from './commands/sync-command';
import { handleVersionCommand } from './commands/version-command';
import { isTruthy } from './config/sync-config';
import { CONFIG_ENV } from './types/config';

async function main(args: string[]): Promise<void> {
  await initUI();

  if (hasAnyFlag(args, ['--help', '-h'])) {
    await handleHelpCommand();
    return;
  }
  if (hasAnyFlag(args, ['--version', '-v'])) {
    await handleVersionCommand(args);
    return;
  }

  await handleSyncCommand(args);
}

const args = process.argv.slice(2);
const verbose = hasAnyFlag(args, ['--verbose']) || isTruthy(process.env[CONFIG_ENV.verbose]);

main(args).catch((error: unknown) => {
  process.exitCode = handleError(error, verbose);
});
