/**
 * @fileoverview Unit tests for the pdb_mirror_sync_recent tool.
 * @module tests/mcp-server/tools/definitions/pdb-mirror-sync-recent.test
 */
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { gzipSync } from 'node:zlib';
import { container } from 'tsyringe';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MirrorService } from '@/container/tokens.js';
import { pdbMirrorSyncRecentTool } from '@/mcp-server/tools/definitions/pdb-mirror-sync-recent.tool.js';
import type { SdkContext } from '@/mcp-server/tools/utils/toolDefinition.js';
import { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import type { MirrorConfig } from '@/services/mirror/types.js';

import {
  createTempMirror,
  FakeArchiveSource,
  TEST_SERVER,
} from '../../../helpers/fakeArchiveSource.js';

const STATUS = `${TEST_SERVER}/pub/pdb/data/status`;
const DIVIDED = `${TEST_SERVER}/pub/pdb/data/structures/divided/pdb`;

describe('pdb_mirror_sync_recent tool', () => {
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

    source.texts.set(
      `${STATUS}/`,
      'drwxr-xr-x 2 ftp ftp 4096 Jan 06 20240103\n',
    );
    source.texts.set(`${STATUS}/20240103/added.pdb`, '1abc\n2abc\n');
    source.texts.set(`${STATUS}/20240103/modified.pdb`, '3def\n');
    source.texts.set(`${STATUS}/20240103/obsolete.pdb`, '4ghi\n5jkl\n');
    source.files.set(
      `${DIVIDED}/ab/pdb1abc.ent.gz`,
      gzipSync('HEADER 1ABC\n'),
    );
    source.files.set(
      `${DIVIDED}/de/pdb3def.ent.gz`,
      gzipSync('HEADER 3DEF\n'),
    );

    await mkdir(path.join(config.localRoot, 'gh'), { recursive: true });
    await writeFile(path.join(config.localRoot, 'gh', 'pdb4ghi.ent'), 'OLD\n');
  });

  afterEach(async () => {
    container.clearInstances();
    await rm(path.dirname(config.localRoot), { recursive: true, force: true });
  });

  it('should have correct tool name', () => {
    expect(pdbMirrorSyncRecentTool.name).toBe('pdb_mirror_sync_recent');
  });

  it('should summarize retrievals and relocations', async () => {
    const input = await pdbMirrorSyncRecentTool.inputSchema.parseAsync({});

    const result = await pdbMirrorSyncRecentTool.logic(
      input,
      context,
      sdkContext,
    );

    expect(result).toEqual({
      period: '20240103',
      fetched: ['1abc', '3def'],
      skipped: [],
      failures: [
        {
          pdbId: '2abc',
          reason: 'not-found',
          message: 'HTTP error! Status: 404 Not Found',
        },
      ],
      relocations: [
        { pdbId: '4ghi', outcome: 'moved' },
        { pdbId: '5jkl', outcome: 'missing' },
      ],
    });
  });

  it('should format the sync summary', () => {
    const content = pdbMirrorSyncRecentTool.responseFormatter?.({
      period: '20240103',
      fetched: ['1abc', '3def'],
      skipped: [],
      failures: [
        {
          pdbId: '2abc',
          reason: 'not-found',
          message: 'HTTP error! Status: 404 Not Found',
        },
      ],
      relocations: [
        { pdbId: '4ghi', outcome: 'moved' },
        { pdbId: '5jkl', outcome: 'missing' },
      ],
    });

    expect(content).toEqual([
      {
        type: 'text',
        text: [
          'Period 20240103',
          'Fetched: 2, already present: 0, failed: 1',
          'Obsolete: 1 moved, 0 already moved, 1 missing, 0 failed',
          '• 2abc: not-found (HTTP error! Status: 404 Not Found)',
        ].join('\n'),
      },
    ]);
  });
});
