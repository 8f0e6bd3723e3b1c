/**
 * @fileoverview Tool definition for reading the latest weekly change lists without syncing.
 * @module src/mcp-server/tools/definitions/pdb-mirror-recent-changes.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { MirrorService } from '@/container/tokens.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import type { RequestContext } from '@/utils/index.js';

const TOOL_NAME = 'pdb_mirror_recent_changes';
const TOOL_TITLE = 'List Recent PDB Changes';
const TOOL_DESCRIPTION =
  'Read the most recent weekly status lists from the archive: entries added, modified and made obsolete. Does not touch the local mirror.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z.object({}).describe('No parameters.');

const OutputSchema = z
  .object({
    period: z.string().describe('Release period directory (YYYYMMDD).'),
    added: z.array(z.string()).describe('Newly released entries.'),
    modified: z.array(z.string()).describe('Entries with updated files.'),
    obsolete: z.array(z.string()).describe('Entries withdrawn this period.'),
  })
  .describe('Weekly change lists.');

type RecentChangesInput = z.infer<typeof InputSchema>;
type RecentChangesOutput = z.infer<typeof OutputSchema>;

async function pdbMirrorRecentChangesLogic(
  _input: RecentChangesInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<RecentChangesOutput> {
  const mirrorService = container.resolve<MirrorServiceClass>(MirrorService);
  return mirrorService.getRecentChanges(appContext);
}

function responseFormatter(result: RecentChangesOutput): ContentBlock[] {
  const preview = (ids: string[]) =>
    ids.length === 0
      ? '(none)'
      : `${ids.slice(0, 10).join(', ')}${ids.length > 10 ? `, ... (+${ids.length - 10})` : ''}`;

  return [
    {
      type: 'text',
      text: [
        `Period: ${result.period}`,
        `Added (${result.added.length}): ${preview(result.added)}`,
        `Modified (${result.modified.length}): ${preview(result.modified)}`,
        `Obsolete (${result.obsolete.length}): ${preview(result.obsolete)}`,
      ].join('\n'),
    },
  ];
}

export const pdbMirrorRecentChangesTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: pdbMirrorRecentChangesLogic,
  responseFormatter,
};
