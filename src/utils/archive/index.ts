/**
 * @fileoverview Local file helpers for mirrored archives: gzip decompression,
 * tarball extraction, existence checks and cross-device moves.
 * @module src/utils/archive
 */
import { createReadStream, createWriteStream } from 'node:fs';
import { access, copyFile, mkdir, rename, unlink } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import { x as extractTar } from 'tar';

/**
 * Decompresses a single gzip stream from `source` into `destination`.
 */
export async function gunzipFile(
  source: string,
  destination: string,
): Promise<void> {
  await pipeline(
    createReadStream(source),
    createGunzip(),
    createWriteStream(destination),
  );
}

/**
 * Extracts every member of a (optionally gzipped) tarball into `directory`,
 * creating it first.
 */
export async function extractTarball(
  source: string,
  directory: string,
): Promise<void> {
  await mkdir(directory, { recursive: true });
  await extractTar({ file: source, cwd: directory });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Moves a file. Falls back to copy-and-unlink when source and destination
 * are on different devices.
 */
export async function moveFile(
  source: string,
  destination: string,
): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EXDEV') {
      await copyFile(source, destination);
      await unlink(source);
      return;
    }
    throw error;
  }
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
