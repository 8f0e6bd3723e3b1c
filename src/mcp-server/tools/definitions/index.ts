/**
 * @fileoverview Barrel file for all tool definitions.
 * This file re-exports all tool definitions for easy import and registration.
 * It also exports an array of all definitions for automated registration.
 * @module src/mcp-server/tools/definitions
 */

import type { AnyToolDefinition } from '../utils/toolDefinition.js';
import { pdbMirrorFetchAllTool } from './pdb-mirror-fetch-all.tool.js';
import { pdbMirrorFetchEntryTool } from './pdb-mirror-fetch-entry.tool.js';
import { pdbMirrorFetchObsoleteTool } from './pdb-mirror-fetch-obsolete.tool.js';
import { pdbMirrorRecentChangesTool } from './pdb-mirror-recent-changes.tool.js';
import { pdbMirrorSyncRecentTool } from './pdb-mirror-sync-recent.tool.js';

/**
 * An array containing all tool definitions for easy iteration.
 */
export const allToolDefinitions: AnyToolDefinition[] = [
  pdbMirrorFetchEntryTool,
  pdbMirrorRecentChangesTool,
  pdbMirrorSyncRecentTool,
  pdbMirrorFetchAllTool,
  pdbMirrorFetchObsoleteTool,
];

export {
  pdbMirrorFetchAllTool,
  pdbMirrorFetchEntryTool,
  pdbMirrorFetchObsoleteTool,
  pdbMirrorRecentChangesTool,
  pdbMirrorSyncRecentTool,
};
