/**
 * @fileoverview Tool definition for fetching a single archive entry into the local mirror.
 * @module src/mcp-server/tools/definitions/pdb-mirror-fetch-entry.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { MirrorService } from '@/container/tokens.js';
import { PdbIdSchema } from '@/mcp-server/tools/utils/mirrorSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import { EntryFormat } from '@/services/mirror/types.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'pdb_mirror_fetch_entry';
const TOOL_TITLE = 'Fetch PDB Entry';
const TOOL_DESCRIPTION =
  'Download one PDB entry into the local mirror and return its local path. Skips the download when the decompressed file is already present (unless the mirror runs in overwrite mode).';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    pdbId: PdbIdSchema,
    format: z
      .nativeEnum(EntryFormat)
      .default(EntryFormat.PDB)
      .describe(
        'File format: pdb (legacy flat file), mmcif (structured text), or bundle (multi-file archive for large structures).',
      ),
    obsolete: z
      .boolean()
      .default(false)
      .describe('Fetch from the obsolete archive into the local obsolete tree.'),
    targetDir: z
      .string()
      .min(1)
      .optional()
      .describe('Store the file in this directory instead of the mirror tree.'),
    extract: z
      .boolean()
      .default(false)
      .describe(
        'Bundle format only: extract the member files instead of keeping a single .tar container.',
      ),
  })
  .describe('Parameters for fetching one entry.');

const OutputSchema = z
  .object({
    pdbId: z.string().describe('Normalized (lowercase) identifier.'),
    format: z.nativeEnum(EntryFormat).describe('Format retrieved.'),
    status: z
      .enum(['fetched', 'skipped'])
      .describe('Whether the file was downloaded or already present.'),
    path: z
      .string()
      .describe('Local file, or directory for an extracted bundle.'),
  })
  .describe('Local location of the entry.');

type FetchEntryInput = z.infer<typeof InputSchema>;
type FetchEntryOutput = z.infer<typeof OutputSchema>;

async function pdbMirrorFetchEntryLogic(
  input: FetchEntryInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<FetchEntryOutput> {
  logger.debug('Fetching entry into mirror', {
    ...appContext,
    toolInput: input,
  });

  const mirrorService = container.resolve<MirrorServiceClass>(MirrorService);
  const result = await mirrorService.requireEntry(
    input.pdbId,
    {
      format: input.format,
      obsolete: input.obsolete,
      targetDir: input.targetDir,
      extract: input.extract,
    },
    appContext,
  );

  logger.info('Entry available locally', {
    ...appContext,
    pdbId: result.entryId,
    status: result.status,
    path: result.path,
  });

  return {
    pdbId: result.entryId,
    format: result.format,
    status: result.status,
    path: result.path,
  };
}

function responseFormatter(result: FetchEntryOutput): ContentBlock[] {
  const verb = result.status === 'fetched' ? 'Downloaded' : 'Already present';
  return [
    {
      type: 'text',
      text: `${verb}: ${result.pdbId.toUpperCase()} (${result.format})\nPath: ${result.path}`,
    },
  ];
}

export const pdbMirrorFetchEntryTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: pdbMirrorFetchEntryLogic,
  responseFormatter,
};
