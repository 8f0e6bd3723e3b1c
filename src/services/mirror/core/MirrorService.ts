/**
 * @fileoverview Maintains the local mirror: resolves entry paths, decides
 * between fetching and skipping, and moves entries between the current and
 * obsolete trees as the weekly change lists dictate.
 * @module src/services/mirror/core/MirrorService
 */
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { inject, injectable } from 'tsyringe';

import { ArchiveSource, MirrorConfigToken } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import {
  extractTarball,
  gunzipFile,
  logger,
  moveFile,
  pathExists,
  type RequestContext,
} from '@/utils/index.js';

import {
  ARCHIVE_ROOT,
  bundleExtractDirName,
  ENTRIES_INDEX_PATH,
  FORMAT_TEMPLATES,
  OBSOLETE_LISTING_PATH,
  SEQRES_PATH,
  STATUS_LIST_FILES,
  STATUS_PATH,
} from '../config.js';
import {
  EntryFormat,
  type BatchReport,
  type ChangeSet,
  type EntryTarget,
  type FetchEntryOptions,
  type MirrorConfig,
  type PdbId,
  type RelocationResult,
  type RetrievalFailure,
  type RetrievalFailureReason,
  type RetrievalResult,
  type SyncReport,
} from '../types.js';
import type { IArchiveSource } from './IArchiveSource.js';
import {
  parseEntriesIndex,
  parseObsoleteListing,
  parseStatusDirectory,
  parseStatusList,
} from './listings.js';

const PDB_ID_PATTERN = /^[0-9][0-9a-z]{3}$/i;

export function isValidPdbId(pdbId: string): boolean {
  return PDB_ID_PATTERN.test(pdbId);
}

const FAILURE_ERROR_CODES: Record<RetrievalFailureReason, JsonRpcErrorCode> = {
  'malformed-identifier': JsonRpcErrorCode.ValidationError,
  'not-found': JsonRpcErrorCode.NotFound,
  unreachable: JsonRpcErrorCode.ServiceUnavailable,
  'filesystem-error': JsonRpcErrorCode.InternalError,
};

@injectable()
export class MirrorService {
  constructor(
    @inject(MirrorConfigToken) private readonly config: MirrorConfig,
    @inject(ArchiveSource) private readonly source: IArchiveSource,
  ) {}

  get configuration(): MirrorConfig {
    return this.config;
  }

  /**
   * Computes the remote URL and local paths for an entry. Pure: touches
   * neither the network nor the filesystem.
   */
  resolveTarget(pdbId: PdbId, options: FetchEntryOptions = {}): EntryTarget {
    const entryId = pdbId.toLowerCase();
    const format = options.format ?? EntryFormat.PDB;
    const obsolete = options.obsolete ?? false;
    const template = FORMAT_TEMPLATES[format];
    const partition = entryId.slice(1, 3);

    const remoteSegments = [
      this.config.serverUrl,
      ARCHIVE_ROOT,
      obsolete ? template.obsoleteSubpath : template.currentSubpath,
      partition,
    ];
    if (template.perEntryDirectory) remoteSegments.push(entryId);
    const archiveName = template.archiveName(entryId);

    const directory =
      options.targetDir ?? this.treeDirectory(entryId, obsolete);
    const outputName =
      format === EntryFormat.BUNDLE && options.extract
        ? bundleExtractDirName(entryId)
        : template.outputName(entryId);

    return {
      entryId,
      format,
      url: [...remoteSegments, archiveName].join('/'),
      directory,
      archivePath: path.join(directory, archiveName),
      outputPath: path.join(directory, outputName),
    };
  }

  /**
   * Fetches one entry unless its decompressed file is already present.
   * Never throws for per-entry problems; they come back as a tagged failure.
   */
  async fetchEntry(
    pdbId: string,
    options: FetchEntryOptions,
    context: RequestContext,
  ): Promise<RetrievalResult> {
    if (!isValidPdbId(pdbId)) {
      const message = `Invalid PDB ID "${pdbId}": expected 4 alphanumeric characters starting with a digit.`;
      logger.warning(message, { ...context, pdbId });
      return {
        ok: false,
        entryId: pdbId,
        reason: 'malformed-identifier',
        message,
      };
    }

    const target = this.resolveTarget(pdbId, options);

    try {
      if (!this.config.overwrite && (await pathExists(target.outputPath))) {
        logger.debug('Structure exists, skipping download', {
          ...context,
          pdbId: target.entryId,
          path: target.outputPath,
        });
        return {
          ok: true,
          status: 'skipped',
          entryId: target.entryId,
          format: target.format,
          path: target.outputPath,
        };
      }

      await mkdir(target.directory, { recursive: true });

      logger.info('Downloading structure', {
        ...context,
        pdbId: target.entryId,
        format: target.format,
        url: target.url,
      });
      await this.downloadTo(target.url, target.archivePath, context);
      await this.materialize(target, options.extract ?? false);

      return {
        ok: true,
        status: 'fetched',
        entryId: target.entryId,
        format: target.format,
        path: target.outputPath,
      };
    } catch (error) {
      return this.toFailure(target.entryId, error, context);
    }
  }

  /**
   * Single-entry variant of fetchEntry: a failure is raised instead of returned.
   * @throws {McpError} ValidationError, NotFound, ServiceUnavailable or InternalError
   */
  async requireEntry(
    pdbId: string,
    options: FetchEntryOptions,
    context: RequestContext,
  ): Promise<Extract<RetrievalResult, { ok: true }>> {
    const result = await this.fetchEntry(pdbId, options, context);
    if (!result.ok) {
      throw new McpError(FAILURE_ERROR_CODES[result.reason], result.message, {
        requestId: context.requestId,
        pdbId: result.entryId,
        reason: result.reason,
      });
    }
    return result;
  }

  /**
   * Reads the added/modified/obsolete lists of the most recent status period.
   * @throws {McpError} NotFound when no period exists, ValidationError on a malformed list
   */
  async getRecentChanges(context: RequestContext): Promise<ChangeSet> {
    const statusUrl = `${this.remoteUrl(STATUS_PATH)}/`;
    const period = parseStatusDirectory(
      await this.source.readText(statusUrl, context),
    );
    if (period === undefined) {
      throw new McpError(
        JsonRpcErrorCode.NotFound,
        `No status period directory found at ${statusUrl}`,
        { requestId: context.requestId, url: statusUrl },
      );
    }

    const periodUrl = `${statusUrl}${period}/`;
    const readList = async (fileName: string): Promise<PdbId[]> => {
      const url = `${periodUrl}${fileName}`;
      return parseStatusList(await this.source.readText(url, context), url);
    };

    const added = await readList(STATUS_LIST_FILES.added);
    const modified = await readList(STATUS_LIST_FILES.modified);
    const obsolete = await readList(STATUS_LIST_FILES.obsolete);

    logger.info('Recent changes retrieved', {
      ...context,
      period,
      added: added.length,
      modified: modified.length,
      obsolete: obsolete.length,
    });

    return { period, added, modified, obsolete };
  }

  /**
   * Every current entry listed in the archive's entries index
   */
  async getAllEntries(context: RequestContext): Promise<PdbId[]> {
    logger.info('Retrieving entries index (about 5 MB)', context);
    const text = await this.source.readText(
      this.remoteUrl(ENTRIES_INDEX_PATH),
      context,
    );
    return parseEntriesIndex(text);
  }

  /**
   * Every entry that has ever been made obsolete
   */
  async getAllObsolete(context: RequestContext): Promise<PdbId[]> {
    const url = this.remoteUrl(OBSOLETE_LISTING_PATH);
    return parseObsoleteListing(await this.source.readText(url, context), url);
  }

  /**
   * Applies the most recent weekly change lists to the local mirror: new and
   * modified entries are fetched in legacy format, obsolete ones are moved
   * into the obsolete tree.
   */
  async syncRecentChanges(context: RequestContext): Promise<SyncReport> {
    await mkdir(this.config.localRoot, { recursive: true });
    await mkdir(this.config.obsoleteRoot, { recursive: true });

    const changes = await this.getRecentChanges(context);

    const retrievals: RetrievalResult[] = [];
    for (const pdbId of [...changes.added, ...changes.modified]) {
      const result = await this.fetchEntry(pdbId, {}, context);
      if (!result.ok) {
        logger.warning(`Failed to update ${result.entryId}`, {
          ...context,
          pdbId: result.entryId,
          reason: result.reason,
          error: result.message,
        });
      }
      retrievals.push(result);
    }

    const relocations: RelocationResult[] = [];
    for (const pdbId of changes.obsolete) {
      relocations.push(await this.relocateObsolete(pdbId, context));
    }

    return { period: changes.period, retrievals, relocations };
  }

  /**
   * Moves an entry's legacy file from the current tree to the obsolete tree.
   * An entry found in neither tree is reported as missing and left alone.
   */
  async relocateObsolete(
    pdbId: PdbId,
    context: RequestContext,
  ): Promise<RelocationResult> {
    const current = this.resolveTarget(pdbId);
    const obsolete = this.resolveTarget(pdbId, { obsolete: true });
    const base = {
      entryId: current.entryId,
      from: current.outputPath,
      to: obsolete.outputPath,
    };

    if (!isValidPdbId(pdbId)) {
      return {
        ...base,
        outcome: 'failed',
        message: `Invalid PDB ID "${pdbId}"`,
      };
    }

    if (await pathExists(current.outputPath)) {
      try {
        await mkdir(obsolete.directory, { recursive: true });
        await moveFile(current.outputPath, obsolete.outputPath);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Could not move ${current.outputPath} to obsolete tree`, {
          ...context,
          pdbId: current.entryId,
          error: message,
        });
        return { ...base, outcome: 'failed', message };
      }
      logger.info('Moved obsolete entry', { ...context, ...base });
      return { ...base, outcome: 'moved' };
    }

    if (await pathExists(obsolete.outputPath)) {
      logger.info(`Obsolete file ${current.outputPath} already moved`, {
        ...context,
        pdbId: current.entryId,
      });
      return { ...base, outcome: 'already-obsolete' };
    }

    logger.notice(`Obsolete file ${current.outputPath} is missing`, {
      ...context,
      pdbId: current.entryId,
    });
    return { ...base, outcome: 'missing' };
  }

  /**
   * Fetches every current entry not yet present locally.
   * @param listFile - When given, the enumerated identifiers are written here first.
   */
  async mirrorAll(
    listFile: string | undefined,
    context: RequestContext,
  ): Promise<BatchReport> {
    const entries = await this.getAllEntries(context);
    return this.runBatch(entries, false, listFile, context);
  }

  /**
   * Fetches every obsolete entry not yet present in the local obsolete tree.
   * @param listFile - When given, the enumerated identifiers are written here first.
   */
  async mirrorObsolete(
    listFile: string | undefined,
    context: RequestContext,
  ): Promise<BatchReport> {
    const entries = await this.getAllObsolete(context);
    return this.runBatch(entries, true, listFile, context);
  }

  /**
   * Downloads the sequence file of all chains (about 15 MB).
   * @returns The path written.
   */
  async fetchSequenceFile(
    savePath: string | undefined,
    context: RequestContext,
  ): Promise<string> {
    const destination =
      savePath ?? path.join(this.config.localRoot, 'pdb_seqres.txt');
    await mkdir(path.dirname(destination), { recursive: true });

    logger.info('Retrieving sequence file (about 15 MB)', {
      ...context,
      destination,
    });
    await this.downloadTo(this.remoteUrl(SEQRES_PATH), destination, context);
    return destination;
  }

  /**
   * Downloads through the archive source, removing whatever was written when
   * the transfer fails.
   */
  private async downloadTo(
    url: string,
    destination: string,
    context: RequestContext,
  ): Promise<void> {
    try {
      await this.source.download(url, destination, context);
    } catch (error) {
      await rm(destination, { force: true });
      throw error;
    }
  }

  private async runBatch(
    entries: PdbId[],
    obsolete: boolean,
    listFile: string | undefined,
    context: RequestContext,
  ): Promise<BatchReport> {
    if (listFile) {
      await mkdir(path.dirname(listFile), { recursive: true });
      await writeFile(listFile, entries.map((id) => `${id}\n`).join(''));
    }

    const report: BatchReport = {
      total: entries.length,
      fetched: 0,
      skipped: 0,
      failed: 0,
      failures: [],
      ...(listFile ? { listFile } : {}),
    };

    for (const pdbId of entries) {
      const result = await this.fetchEntry(pdbId, { obsolete }, context);
      if (result.ok) {
        if (result.status === 'fetched') report.fetched += 1;
        else report.skipped += 1;
        continue;
      }
      report.failed += 1;
      report.failures.push(result);
      logger.warning(`Failed to mirror ${result.entryId}`, {
        ...context,
        pdbId: result.entryId,
        reason: result.reason,
        error: result.message,
      });
    }

    logger.info('Batch mirror finished', {
      ...context,
      obsolete,
      total: report.total,
      fetched: report.fetched,
      skipped: report.skipped,
      failed: report.failed,
    });
    return report;
  }

  /**
   * Turns the downloaded archive into its final form and removes the archive.
   * A partial output is removed on failure so a later run does not skip it.
   */
  private async materialize(
    target: EntryTarget,
    extract: boolean,
  ): Promise<void> {
    try {
      if (target.format === EntryFormat.BUNDLE && extract) {
        await extractTarball(target.archivePath, target.outputPath);
      } else {
        await gunzipFile(target.archivePath, target.outputPath);
      }
    } catch (error) {
      await rm(target.outputPath, { recursive: true, force: true });
      throw error;
    } finally {
      await rm(target.archivePath, { force: true });
    }
  }

  private toFailure(
    entryId: PdbId,
    error: unknown,
    context: RequestContext,
  ): RetrievalFailure {
    const message = error instanceof Error ? error.message : String(error);
    let reason: RetrievalFailureReason = 'filesystem-error';
    if (error instanceof McpError) {
      reason =
        error.code === JsonRpcErrorCode.NotFound ? 'not-found' : 'unreachable';
    }

    logger.error('Structure retrieval failed', {
      ...context,
      pdbId: entryId,
      reason,
      error: message,
    });
    return { ok: false, entryId, reason, message };
  }

  private treeDirectory(entryId: PdbId, obsolete: boolean): string {
    const root = obsolete ? this.config.obsoleteRoot : this.config.localRoot;
    return this.config.flatTree ? root : path.join(root, entryId.slice(1, 3));
  }

  private remoteUrl(remotePath: string): string {
    return `${this.config.serverUrl}/${remotePath}`;
  }
}
