/**
 * @fileoverview Tool definition for the full mirror bulk download.
 * @module src/mcp-server/tools/definitions/pdb-mirror-fetch-all.tool
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

const TOOL_NAME = 'pdb_mirror_fetch_all';
const TOOL_TITLE = 'Mirror Entire PDB';
const TOOL_DESCRIPTION =
  'Download every current PDB entry (legacy format) that is not yet in the local mirror. Long-running: the archive holds hundreds of thousands of entries. Rerun to resume; present entries are skipped.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

async function pdbMirrorFetchAllLogic(
  input: BatchInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<BatchOutput> {
  const mirrorService = container.resolve<MirrorServiceClass>(MirrorService);
  const report = await mirrorService.mirrorAll(input.listFile, appContext);
  return toBatchOutput(report);
}

function responseFormatter(result: BatchOutput): ContentBlock[] {
  return formatBatchOutput('Full mirror', result);
}

export const pdbMirrorFetchAllTool: ToolDefinition<
  typeof BatchInputSchema,
  typeof BatchOutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: BatchInputSchema,
  outputSchema: BatchOutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: pdbMirrorFetchAllLogic,
  responseFormatter,
};
