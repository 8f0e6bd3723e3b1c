/**
 * @fileoverview Parsers for the plain-text listings published by the archive.
 * @module src/services/mirror/core/listings
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

import type { PdbId } from '../types.js';

const PDB_ID_LENGTH = 4;
const ENTRIES_INDEX_HEADER_LINES = 2;
const OBSOLETE_RECORD_PREFIX = 'OBSLTE ';

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function assertPdbId(token: string, source: string, lineNumber: number): PdbId {
  if (token.length !== PDB_ID_LENGTH) {
    throw new McpError(
      JsonRpcErrorCode.ValidationError,
      `Malformed listing ${source}: expected a 4-character identifier at line ${lineNumber}, got "${token}"`,
      { source, lineNumber, token, errorSource: 'MalformedListing' },
    );
  }
  return token;
}

/**
 * Picks the most recent period from a status directory listing.
 *
 * Accepts both FTP-style listings, where the name is the last field of each
 * line, and HTML index pages, where names appear as `href` targets. Only
 * all-numeric names are periods; the numerically largest wins.
 */
export function parseStatusDirectory(text: string): string | undefined {
  const candidates = new Set<string>();
  for (const line of splitLines(text)) {
    for (const match of line.matchAll(/href="([^"]+)"/g)) {
      candidates.add(match[1].replace(/\/+$/, ''));
    }
    const fields = line.trim().split(/\s+/);
    const last = fields[fields.length - 1];
    if (last) candidates.add(last.replace(/\/+$/, ''));
  }

  let latest: string | undefined;
  for (const name of candidates) {
    if (!/^\d+$/.test(name)) continue;
    if (latest === undefined || BigInt(name) > BigInt(latest)) latest = name;
  }
  return latest;
}

/**
 * Parses a weekly status list (`added.pdb`, `modified.pdb`, `obsolete.pdb`):
 * one identifier per line.
 * @throws {McpError} ValidationError when a line is not a 4-character token.
 */
export function parseStatusList(text: string, source: string): PdbId[] {
  const ids: PdbId[] = [];
  splitLines(text).forEach((line, index) => {
    const token = line.trim();
    if (token.length === 0) return;
    ids.push(assertPdbId(token, source, index + 1));
  });
  return ids;
}

/**
 * Parses `entries.idx`: two header lines, then one record per entry whose
 * first four columns are the identifier.
 */
export function parseEntriesIndex(text: string): PdbId[] {
  return splitLines(text)
    .slice(ENTRIES_INDEX_HEADER_LINES)
    .filter((line) => line.trimEnd().length >= PDB_ID_LENGTH)
    .map((line) => line.slice(0, PDB_ID_LENGTH));
}

/**
 * Parses `obsolete.dat`. Only `OBSLTE` records count; the identifier is the
 * third whitespace-delimited field (after the keyword and the date).
 * @throws {McpError} ValidationError when that field is not 4 characters.
 */
export function parseObsoleteListing(text: string, source: string): PdbId[] {
  const ids: PdbId[] = [];
  splitLines(text).forEach((line, index) => {
    if (!line.startsWith(OBSOLETE_RECORD_PREFIX)) return;
    const token = line.trim().split(/\s+/)[2] ?? '';
    ids.push(assertPdbId(token, source, index + 1));
  });
  return ids;
}
