/**
 * @fileoverview wwPDB archive layout constants and per-format path templates.
 * @module src/services/mirror/config
 */
import { EntryFormat, type FormatTemplate } from './types.js';

/**
 * Default archive server (HTTPS view of the wwPDB FTP tree)
 */
export const WWPDB_SERVER_URL = 'https://files.wwpdb.org';

/**
 * Root of the archive tree on the server
 */
export const ARCHIVE_ROOT = 'pub/pdb';

/**
 * Weekly status directories, one per release period (e.g. `20031013/`)
 */
export const STATUS_PATH = `${ARCHIVE_ROOT}/data/status`;

/**
 * Fixed-width index of every current entry
 */
export const ENTRIES_INDEX_PATH = `${ARCHIVE_ROOT}/derived_data/index/entries.idx`;

/**
 * OBSLTE records for every entry ever made obsolete
 */
export const OBSOLETE_LISTING_PATH = `${STATUS_PATH}/obsolete.dat`;

/**
 * All chain sequences in FASTA format
 */
export const SEQRES_PATH = `${ARCHIVE_ROOT}/derived_data/pdb_seqres.txt`;

export const STATUS_LIST_FILES = {
  added: 'added.pdb',
  modified: 'modified.pdb',
  obsolete: 'obsolete.pdb',
} as const;

export const FORMAT_TEMPLATES: Record<EntryFormat, FormatTemplate> = {
  [EntryFormat.PDB]: {
    currentSubpath: 'data/structures/divided/pdb',
    obsoleteSubpath: 'data/structures/obsolete/pdb',
    perEntryDirectory: false,
    archiveName: (id) => `pdb${id}.ent.gz`,
    outputName: (id) => `pdb${id}.ent`,
  },
  [EntryFormat.MMCIF]: {
    currentSubpath: 'data/structures/divided/mmCIF',
    obsoleteSubpath: 'data/structures/obsolete/mmCIF',
    perEntryDirectory: false,
    archiveName: (id) => `${id}.cif.gz`,
    outputName: (id) => `${id}.cif`,
  },
  // Bundles are only published under one tree.
  [EntryFormat.BUNDLE]: {
    currentSubpath: 'compatible/pdb_bundle',
    obsoleteSubpath: 'compatible/pdb_bundle',
    perEntryDirectory: true,
    archiveName: (id) => `${id}-pdb-bundle.tar.gz`,
    outputName: (id) => `${id}-pdb-bundle.tar`,
  },
};

/**
 * Directory an extracted bundle's members are written to
 */
export function bundleExtractDirName(id: string): string {
  return `${id}-pdb-bundle`;
}
