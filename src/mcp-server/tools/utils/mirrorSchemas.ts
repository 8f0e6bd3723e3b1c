/**
 * @fileoverview Zod schemas shared by the mirror tools.
 * @module src/mcp-server/tools/utils/mirrorSchemas
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { BatchReport } from '@/services/mirror/types.js';

const MAX_LISTED_FAILURES = 20;

export const PdbIdSchema = z
  .string()
  .length(4, 'PDB ID must be exactly 4 characters.')
  .regex(
    /^[0-9][0-9A-Z]{3}$/i,
    'PDB ID must be alphanumeric, starting with a digit.',
  )
  .describe('4-character PDB identifier (e.g., "1ABC", "2GBP").');

export const FailureSchema = z.object({
  pdbId: z.string().describe('Identifier that failed.'),
  reason: z
    .enum([
      'malformed-identifier',
      'not-found',
      'unreachable',
      'filesystem-error',
    ])
    .describe('Failure category.'),
  message: z.string().describe('Error detail.'),
});

export const BatchOutputSchema = z
  .object({
    total: z.number().describe('Entries enumerated from the remote listing.'),
    fetched: z.number().describe('Entries downloaded in this run.'),
    skipped: z.number().describe('Entries already present locally.'),
    failed: z.number().describe('Entries that could not be retrieved.'),
    failures: z.array(FailureSchema).describe('Details of failed entries.'),
    listFile: z
      .string()
      .optional()
      .describe('Path the identifier list was written to.'),
  })
  .describe('Outcome of a bulk mirror run.');

export const BatchInputSchema = z
  .object({
    listFile: z
      .string()
      .min(1)
      .optional()
      .describe(
        'Optional local file to receive the enumerated identifiers, one per line.',
      ),
  })
  .describe('Parameters for a bulk mirror run.');

export type BatchInput = z.infer<typeof BatchInputSchema>;
export type BatchOutput = z.infer<typeof BatchOutputSchema>;

export function toBatchOutput(report: BatchReport): BatchOutput {
  return {
    total: report.total,
    fetched: report.fetched,
    skipped: report.skipped,
    failed: report.failed,
    failures: report.failures.map((f) => ({
      pdbId: f.entryId,
      reason: f.reason,
      message: f.message,
    })),
    ...(report.listFile ? { listFile: report.listFile } : {}),
  };
}

/**
 * Text summary of a bulk run. Only the first failures are listed.
 */
export function formatBatchOutput(
  label: string,
  result: BatchOutput,
): ContentBlock[] {
  const hidden = result.failures.length - MAX_LISTED_FAILURES;
  const lines = [
    `${label}: ${result.total} entries`,
    `Fetched: ${result.fetched}, already present: ${result.skipped}, failed: ${result.failed}`,
    ...(result.listFile ? [`Identifier list: ${result.listFile}`] : []),
    ...result.failures
      .slice(0, MAX_LISTED_FAILURES)
      .map((f) => `• ${f.pdbId}: ${f.reason} (${f.message})`),
    ...(hidden > 0 ? [`... and ${hidden} more failures`] : []),
  ];
  return [{ type: 'text', text: lines.join('\n') }];
}
