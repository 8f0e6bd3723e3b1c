/**
 * @fileoverview `update`, `all`, `obsolete` and `seqres` commands.
 * @module src/cli/commands/sync
 */
import type { Command } from 'commander';

import type { BatchReport } from '@/services/mirror/types.js';

import { runCommand } from '../context.js';

function printBatchReport(label: string, report: BatchReport): void {
  console.log(`${label}: ${report.total} entries`);
  console.log(
    `  fetched ${report.fetched}, already present ${report.skipped}, failed ${report.failed}`,
  );
  if (report.listFile) {
    console.log(`  identifier list written to ${report.listFile}`);
  }
  for (const failure of report.failures) {
    console.log(`  error ${failure.entryId}: ${failure.message}`);
  }
}

export function registerSyncCommands(program: Command): void {
  program
    .command('update')
    .description('Apply the latest weekly change lists to the local mirror')
    .action(async (_options: unknown, command: Command) =>
      runCommand(
        command,
        'SyncRecentChanges',
        async ({ mirrorService, context }) => {
          const { localRoot } = mirrorService.configuration;
          console.log(`Updating local PDB at ${localRoot}`);

          const report = await mirrorService.syncRecentChanges(context);
          const failed = report.retrievals.filter((r) => !r.ok).length;
          console.log(`Period ${report.period}`);
          console.log(
            `  ${report.retrievals.length - failed} added/modified entries up to date, ${failed} failed`,
          );
          for (const relocation of report.relocations) {
            console.log(
              `  obsolete ${relocation.entryId}: ${relocation.outcome}`,
            );
          }
        },
      ),
    );

  program
    .command('all')
    .argument('[listFile]', 'write the enumerated identifiers to this file')
    .description('Download every current entry missing from the local mirror')
    .action(
      async (
        listFile: string | undefined,
        _options: unknown,
        command: Command,
      ) =>
        runCommand(command, 'MirrorAll', async ({ mirrorService, context }) => {
          const report = await mirrorService.mirrorAll(listFile, context);
          printBatchReport('Full mirror', report);
        }),
    );

  program
    .command('obsolete')
    .argument('[listFile]', 'write the enumerated identifiers to this file')
    .description(
      'Download every obsolete entry missing from the local obsolete tree',
    )
    .action(
      async (
        listFile: string | undefined,
        _options: unknown,
        command: Command,
      ) =>
        runCommand(
          command,
          'MirrorObsolete',
          async ({ mirrorService, context }) => {
            const report = await mirrorService.mirrorObsolete(
              listFile,
              context,
            );
            printBatchReport('Obsolete mirror', report);
          },
        ),
    );

  program
    .command('seqres')
    .argument('[savePath]', 'destination file (default: <root>/pdb_seqres.txt)')
    .description('Download the sequence file of all PDB chains')
    .action(
      async (
        savePath: string | undefined,
        _options: unknown,
        command: Command,
      ) =>
        runCommand(
          command,
          'FetchSequenceFile',
          async ({ mirrorService, context }) => {
            console.log(
              await mirrorService.fetchSequenceFile(savePath, context),
            );
          },
        ),
    );
}
