/**
 * @fileoverview Unit tests for the pdb_mirror_recent_changes tool.
 * @module tests/mcp-server/tools/definitions/pdb-mirror-recent-changes.test
 */
import { rm } from 'node:fs/promises';
import path from 'node:path';
import { container } from 'tsyringe';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MirrorService } from '@/container/tokens.js';
import { pdbMirrorRecentChangesTool } from '@/mcp-server/tools/definitions/pdb-mirror-recent-changes.tool.js';
import type { SdkContext } from '@/mcp-server/tools/utils/toolDefinition.js';
import { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import type { MirrorConfig } from '@/services/mirror/types.js';
import { JsonRpcErrorCode } from '@/types-global/errors.js';

import {
  createTempMirror,
  FakeArchiveSource,
  TEST_SERVER,
} from '../../../helpers/fakeArchiveSource.js';

const STATUS = `${TEST_SERVER}/pub/pdb/data/status`;

describe('pdb_mirror_recent_changes tool', () => {
  const context = {
    requestId: 'test-req-1',
    timestamp: new Date().toISOString(),
    operation: 'test',
  };

  const sdkContext: SdkContext = {
    signal: new AbortController().signal,
    requestId: 'test-req-1',
    sendNotification: vi.fn(),
    sendRequest: vi.fn(),
  };

  let config: MirrorConfig;
  let source: FakeArchiveSource;

  beforeEach(async () => {
    config = await createTempMirror();
    source = new FakeArchiveSource();
    container.register(MirrorService, {
      useValue: new MirrorServiceClass(config, source),
    });
  });

  afterEach(async () => {
    container.clearInstances();
    await rm(path.dirname(config.localRoot), { recursive: true, force: true });
  });

  describe('Tool Metadata', () => {
    it('should have correct tool name', () => {
      expect(pdbMirrorRecentChangesTool.name).toBe('pdb_mirror_recent_changes');
    });

    it('should be read-only', () => {
      expect(pdbMirrorRecentChangesTool.annotations).toEqual({
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: true,
      });
    });
  });

  describe('Listing Logic', () => {
    it('should return the lists of the latest period', async () => {
      source.texts.set(
        `${STATUS}/`,
        '<a href="20231227/">20231227/</a>\n<a href="20240103/">20240103/</a>\n',
      );
      source.texts.set(`${STATUS}/20240103/added.pdb`, '1abc\n2abc\n');
      source.texts.set(`${STATUS}/20240103/modified.pdb`, '');
      source.texts.set(`${STATUS}/20240103/obsolete.pdb`, '4ghi\n');
      const input = await pdbMirrorRecentChangesTool.inputSchema.parseAsync({});

      const result = await pdbMirrorRecentChangesTool.logic(
        input,
        context,
        sdkContext,
      );

      expect(result).toEqual({
        period: '20240103',
        added: ['1abc', '2abc'],
        modified: [],
        obsolete: ['4ghi'],
      });
      expect(source.downloads).toEqual([]);
    });

    it('should raise NotFound when no period is listed', async () => {
      source.texts.set(`${STATUS}/`, 'obsolete.dat\n');
      const input = await pdbMirrorRecentChangesTool.inputSchema.parseAsync({});

      await expect(
        pdbMirrorRecentChangesTool.logic(input, context, sdkContext),
      ).rejects.toMatchObject({ code: JsonRpcErrorCode.NotFound });
    });
  });

  describe('Response Formatting', () => {
    it('should preview at most ten identifiers per list', () => {
      const added = Array.from({ length: 12 }, (_, i) => `${i + 10}ab`);

      const content = pdbMirrorRecentChangesTool.responseFormatter?.({
        period: '20240103',
        added,
        modified: [],
        obsolete: ['4ghi'],
      });

      expect(content).toEqual([
        {
          type: 'text',
          text: [
            'Period: 20240103',
            'Added (12): 10ab, 11ab, 12ab, 13ab, 14ab, 15ab, 16ab, 17ab, 18ab, 19ab, ... (+2)',
            'Modified (0): (none)',
            'Obsolete (1): 4ghi',
          ].join('\n'),
        },
      ]);
    });
  });
});
