/**
 * @fileoverview Builds the `pdb-mirror` command-line program.
 * @module src/cli
 */
import { Command } from 'commander';

import { APP_VERSION } from '@/config/index.js';

import { registerFetchCommand } from './commands/fetch.js';
import { registerServeCommand } from './commands/serve.js';
import { registerSyncCommands } from './commands/sync.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pdb-mirror')
    .description(
      'Mirror the wwPDB archive locally: weekly updates, bulk downloads and single entries',
    )
    .version(APP_VERSION)
    .option('--root <dir>', 'local tree for current entries')
    .option('--obsolete-root <dir>', 'local tree for obsolete entries')
    .option('--server <url>', 'archive server base URL')
    .option('-d, --flat', 'store all entries in one directory, no partitioning')
    .option('-o, --overwrite', 'download even when the file already exists');

  registerSyncCommands(program);
  registerFetchCommand(program);
  registerServeCommand(program);

  return program;
}
