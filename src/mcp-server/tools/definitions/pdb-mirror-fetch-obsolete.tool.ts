/**
 * @fileoverview Tool definition for the obsolete mirror bulk download.
 * @module src/mcp-server/tools/definitions/pdb-mirror-fetch-obsolete.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';

import { MirrorService } from '@/container/tokens.js';
import {
  type BatchInput,
  BatchInputSchema,
  type BatchOutput,
  BatchOutputSchema,
  formatBatchOutput,
  toBatchOutput,
} from '@/mcp-server/tools/utils/mirrorSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import type { RequestContext } from '@/utils/index.js';

const TOOL_NAME = 'pdb_mirror_fetch_obsolete';
const TOOL_TITLE = 'Mirror Obsolete PDB Entries';
const TOOL_DESCRIPTION =
  'Download every entry ever made obsolete (legacy format) into the local obsolete tree, skipping those already present.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

async function pdbMirrorFetchObsoleteLogic(
  input: BatchInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<BatchOutput> {
  const mirrorService = container.resolve<MirrorServiceClass>(MirrorService);
  const report = await mirrorService.mirrorObsolete(input.listFile, appContext);
  return toBatchOutput(report);
}

function responseFormatter(result: BatchOutput): ContentBlock[] {
  return formatBatchOutput('Obsolete mirror', result);
}

export const pdbMirrorFetchObsoleteTool: ToolDefinition<
  typeof BatchInputSchema,
  typeof BatchOutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: BatchInputSchema,
  outputSchema: BatchOutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: pdbMirrorFetchObsoleteLogic,
  responseFormatter,
};
