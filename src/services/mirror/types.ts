/**
 * @fileoverview Type definitions for the mirror service domain.
 * Defines entry formats, their archive layout templates, configuration and result DTOs.
 * @module src/services/mirror/types
 */

/**
 * 4-character PDB identifier (e.g., "1abc"), first character numeric.
 */
export type PdbId = string;

/**
 * Entry file formats available from the archive
 */
export enum EntryFormat {
  /** Legacy PDB flat file */
  PDB = 'pdb',
  /** mmCIF structured text */
  MMCIF = 'mmcif',
  /** PDB-format bundle for structures too large for a single legacy file */
  BUNDLE = 'bundle',
}

/**
 * Declarative description of where a format lives remotely and what it
 * becomes locally.
 */
export interface FormatTemplate {
  /** Remote directory for current entries, relative to the server's `/pub/pdb`. */
  currentSubpath: string;
  /** Remote directory for obsolete entries, relative to the server's `/pub/pdb`. */
  obsoleteSubpath: string;
  /** Whether the remote path adds a directory named after the entry below the partition. */
  perEntryDirectory: boolean;
  archiveName(id: PdbId): string;
  outputName(id: PdbId): string;
}

/**
 * Immutable mirror settings, fixed for the lifetime of a MirrorService.
 */
export interface MirrorConfig {
  readonly serverUrl: string;
  readonly localRoot: string;
  readonly obsoleteRoot: string;
  readonly flatTree: boolean;
  readonly overwrite: boolean;
  readonly requestTimeoutMs: number;
}

export interface FetchEntryOptions {
  format?: EntryFormat;
  /** Read from the remote obsolete tree and store in the local obsolete tree. */
  obsolete?: boolean;
  /** Store in this directory instead of the configured tree. */
  targetDir?: string;
  /** Bundle format only: extract the members instead of keeping the `.tar` container. */
  extract?: boolean;
}

/**
 * Fully resolved locations for one entry retrieval
 */
export interface EntryTarget {
  entryId: PdbId;
  format: EntryFormat;
  url: string;
  directory: string;
  archivePath: string;
  /** Decompressed file, or the extraction directory for an extracted bundle. */
  outputPath: string;
}

export type RetrievalFailureReason =
  | 'malformed-identifier'
  | 'not-found'
  | 'unreachable'
  | 'filesystem-error';

export type RetrievalResult =
  | {
      ok: true;
      status: 'fetched' | 'skipped';
      entryId: PdbId;
      format: EntryFormat;
      path: string;
    }
  | {
      ok: false;
      entryId: string;
      reason: RetrievalFailureReason;
      message: string;
    };

export type RetrievalFailure = Extract<RetrievalResult, { ok: false }>;

/**
 * Weekly change lists from the most recent status period
 */
export interface ChangeSet {
  period: string;
  added: PdbId[];
  modified: PdbId[];
  obsolete: PdbId[];
}

export type RelocationOutcome =
  | 'moved'
  | 'already-obsolete'
  | 'missing'
  | 'failed';

export interface RelocationResult {
  entryId: PdbId;
  outcome: RelocationOutcome;
  from: string;
  to: string;
  message?: string;
}

export interface SyncReport {
  period: string;
  retrievals: RetrievalResult[];
  relocations: RelocationResult[];
}

export interface BatchReport {
  total: number;
  fetched: number;
  skipped: number;
  failed: number;
  failures: RetrievalFailure[];
  listFile?: string;
}
