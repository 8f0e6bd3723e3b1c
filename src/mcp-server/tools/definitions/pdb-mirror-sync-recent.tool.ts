/**
 * @fileoverview Tool definition for applying the latest weekly change lists to the local mirror.
 * @module src/mcp-server/tools/definitions/pdb-mirror-sync-recent.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { MirrorService } from '@/container/tokens.js';
import { FailureSchema } from '@/mcp-server/tools/utils/mirrorSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'pdb_mirror_sync_recent';
const TOOL_TITLE = 'Sync Recent PDB Changes';
const TOOL_DESCRIPTION =
  'Apply the most recent weekly change lists to the local mirror: download added and modified entries (legacy PDB format) and move obsolete entries into the obsolete tree. Intended to run once a week.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z.object({}).describe('No parameters.');

const OutputSchema = z
  .object({
    period: z.string().describe('Release period that was applied.'),
    fetched: z.array(z.string()).describe('Entries downloaded.'),
    skipped: z.array(z.string()).describe('Entries already present.'),
    failures: z.array(FailureSchema).describe('Entries that failed.'),
    relocations: z
      .array(
        z.object({
          pdbId: z.string(),
          outcome: z
            .enum(['moved', 'already-obsolete', 'missing', 'failed'])
            .describe(
              'moved: relocated now; already-obsolete: found in the obsolete tree; missing: in neither tree; failed: move error.',
            ),
          message: z.string().optional(),
        }),
      )
      .describe('What happened to each obsolete entry.'),
  })
  .describe('Result of a weekly sync.');

type SyncRecentInput = z.infer<typeof InputSchema>;
type SyncRecentOutput = z.infer<typeof OutputSchema>;

async function pdbMirrorSyncRecentLogic(
  _input: SyncRecentInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<SyncRecentOutput> {
  const mirrorService = container.resolve<MirrorServiceClass>(MirrorService);
  const report = await mirrorService.syncRecentChanges(appContext);

  const output: SyncRecentOutput = {
    period: report.period,
    fetched: [],
    skipped: [],
    failures: [],
    relocations: report.relocations.map((r) => ({
      pdbId: r.entryId,
      outcome: r.outcome,
      ...(r.message ? { message: r.message } : {}),
    })),
  };
  for (const retrieval of report.retrievals) {
    if (!retrieval.ok) {
      output.failures.push({
        pdbId: retrieval.entryId,
        reason: retrieval.reason,
        message: retrieval.message,
      });
    } else if (retrieval.status === 'fetched') {
      output.fetched.push(retrieval.entryId);
    } else {
      output.skipped.push(retrieval.entryId);
    }
  }

  logger.info('Weekly sync applied', {
    ...appContext,
    period: output.period,
    fetched: output.fetched.length,
    skipped: output.skipped.length,
    failed: output.failures.length,
    relocated: output.relocations.length,
  });

  return output;
}

function responseFormatter(result: SyncRecentOutput): ContentBlock[] {
  const countOutcome = (outcome: string) =>
    result.relocations.filter((r) => r.outcome === outcome).length;

  const lines = [
    `Period ${result.period}`,
    `Fetched: ${result.fetched.length}, already present: ${result.skipped.length}, failed: ${result.failures.length}`,
    `Obsolete: ${countOutcome('moved')} moved, ${countOutcome('already-obsolete')} already moved, ${countOutcome('missing')} missing, ${countOutcome('failed')} failed`,
    ...result.failures.map((f) => `• ${f.pdbId}: ${f.reason} (${f.message})`),
  ];
  return [{ type: 'text', text: lines.join('\n') }];
}

export const pdbMirrorSyncRecentTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: pdbMirrorSyncRecentLogic,
  responseFormatter,
};
