/**
 * @fileoverview `fetch` command: retrieve a single entry.
 * @module src/cli/commands/fetch
 */
import { Option, type Command } from 'commander';

import { EntryFormat } from '@/services/mirror/types.js';

import { runCommand } from '../context.js';

interface FetchOptions {
  format: EntryFormat;
  extract?: boolean;
  obsolete?: boolean;
}

export function registerFetchCommand(program: Command): void {
  program
    .command('fetch')
    .argument('<pdbId>', '4-character PDB identifier')
    .argument('[targetDir]', 'store the file here instead of the mirror tree')
    .description('Download a single entry (skipped when already present)')
    .addOption(
      new Option('-f, --format <format>', 'file format')
        .choices(Object.values(EntryFormat))
        .default(EntryFormat.PDB),
    )
    .option('--extract', 'bundle format: extract the member files')
    .option('--obsolete', 'fetch from the obsolete archive')
    .action(
      async (
        pdbId: string,
        targetDir: string | undefined,
        options: FetchOptions,
        command: Command,
      ) =>
        runCommand(command, 'FetchEntry', async ({ mirrorService, context }) => {
          const result = await mirrorService.requireEntry(
            pdbId,
            {
              format: options.format,
              obsolete: options.obsolete,
              targetDir,
              extract: options.extract,
            },
            context,
          );
          console.log(
            result.status === 'skipped'
              ? `Structure exists: ${result.path}`
              : result.path,
          );
        }),
    );
}
