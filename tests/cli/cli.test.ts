/**
 * @fileoverview Tests for the `pdb-mirror` command-line program.
 * @module tests/cli/cli.test
 */
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { toMirrorOverrides } from '@/cli/context.js';
import { createProgram } from '@/cli/index.js';
import { logger } from '@/utils/index.js';

describe('toMirrorOverrides', () => {
  it('should map global options onto mirror settings', () => {
    expect(
      toMirrorOverrides({
        root: '/data/pdb',
        obsoleteRoot: '/data/obsolete',
        server: 'https://archive.test',
        flat: true,
        overwrite: true,
      }),
    ).toEqual({
      localRoot: '/data/pdb',
      obsoleteRoot: '/data/obsolete',
      serverUrl: 'https://archive.test',
      flatTree: true,
      overwrite: true,
    });
  });

  it('should leave unset options undefined', () => {
    expect(toMirrorOverrides({})).toEqual({
      localRoot: undefined,
      obsoleteRoot: undefined,
      serverUrl: undefined,
      flatTree: undefined,
      overwrite: undefined,
    });
  });
});

describe('createProgram', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'pdb-mirror-cli-'));
  });

  afterEach(async () => {
    process.exitCode = undefined;
    logger.setLevel('crit');
    await rm(root, { recursive: true, force: true });
  });

  it('should register every command', () => {
    const names = createProgram().commands.map((command) => command.name());

    expect(names).toEqual([
      'update',
      'all',
      'obsolete',
      'seqres',
      'fetch',
      'serve',
    ]);
  });

  it('should report an existing entry without downloading it', async () => {
    const existing = path.join(root, 'ab', 'pdb1abc.ent');
    await mkdir(path.dirname(existing), { recursive: true });
    await writeFile(existing, 'HEADER\n');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createProgram()
      .exitOverride()
      .parseAsync(['--root', root, 'fetch', '1ABC'], { from: 'user' });

    expect(log).toHaveBeenCalledWith(`Structure exists: ${existing}`);
    expect(process.exitCode).toBeUndefined();
  });

  it('should honour the flat layout flag', async () => {
    const existing = path.join(root, '1abc.cif');
    await writeFile(existing, 'data_1ABC\n');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createProgram()
      .exitOverride()
      .parseAsync(['--root', root, '-d', 'fetch', '1abc', '-f', 'mmcif'], {
        from: 'user',
      });

    expect(log).toHaveBeenCalledWith(`Structure exists: ${existing}`);
  });

  it('should print the error and set a failing exit code for a bad identifier', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await createProgram()
      .exitOverride()
      .parseAsync(['--root', root, 'fetch', '1A'], { from: 'user' });

    expect(error).toHaveBeenCalledWith(
      'Error: Invalid PDB ID "1A": expected 4 alphanumeric characters starting with a digit.',
    );
    expect(process.exitCode).toBe(1);
  });
});
