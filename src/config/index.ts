/**
 * @fileoverview Loads and validates application configuration from the environment.
 * @module src/config
 */
import path from 'node:path';
import { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { WWPDB_SERVER_URL } from '@/services/mirror/config.js';
import type { MirrorConfig } from '@/services/mirror/types.js';

export const APP_NAME = 'pdb-mirror-mcp-server';
export const APP_VERSION = '1.0.0';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PDB_MIRROR_SERVER: z.string().url().default(WWPDB_SERVER_URL),
  PDB_MIRROR_ROOT: z.string().min(1).optional(),
  PDB_MIRROR_OBSOLETE_ROOT: z.string().min(1).optional(),
  PDB_MIRROR_FLAT: booleanFlag.default('false'),
  PDB_MIRROR_OVERWRITE: booleanFlag.default('false'),
  PDB_MIRROR_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(120_000),
  PDB_MIRROR_LOG_LEVEL: z
    .enum(['debug', 'info', 'notice', 'warning', 'error', 'crit'])
    .default('info'),
});

export type AppConfig = {
  serverUrl: string;
  localRoot: string;
  obsoleteRoot?: string;
  flatTree: boolean;
  overwrite: boolean;
  requestTimeoutMs: number;
  logLevel: z.infer<typeof EnvSchema>['PDB_MIRROR_LOG_LEVEL'];
};

/**
 * Parses an environment map into the application config.
 * @throws {McpError} ConfigurationError listing every invalid variable.
 */
export function parseConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new McpError(
      JsonRpcErrorCode.ConfigurationError,
      `Invalid environment configuration: ${issues.join('; ')}`,
      { issues },
    );
  }

  const vars = parsed.data;
  return {
    serverUrl: vars.PDB_MIRROR_SERVER,
    localRoot: path.resolve(cwd, vars.PDB_MIRROR_ROOT ?? '.'),
    obsoleteRoot: vars.PDB_MIRROR_OBSOLETE_ROOT
      ? path.resolve(cwd, vars.PDB_MIRROR_OBSOLETE_ROOT)
      : undefined,
    flatTree: vars.PDB_MIRROR_FLAT,
    overwrite: vars.PDB_MIRROR_OVERWRITE,
    requestTimeoutMs: vars.PDB_MIRROR_REQUEST_TIMEOUT_MS,
    logLevel: vars.PDB_MIRROR_LOG_LEVEL,
  };
}

export interface MirrorConfigOverrides {
  serverUrl?: string;
  localRoot?: string;
  obsoleteRoot?: string;
  flatTree?: boolean;
  overwrite?: boolean;
}

/**
 * Derives the frozen mirror configuration, letting command-line overrides
 * win over the environment. The obsolete tree defaults to `<root>/obsolete`.
 */
export function buildMirrorConfig(
  appConfig: AppConfig,
  overrides: MirrorConfigOverrides = {},
): MirrorConfig {
  const localRoot = path.resolve(overrides.localRoot ?? appConfig.localRoot);
  const obsoleteRoot = overrides.obsoleteRoot ?? appConfig.obsoleteRoot;
  return Object.freeze({
    serverUrl: (overrides.serverUrl ?? appConfig.serverUrl).replace(/\/+$/, ''),
    localRoot,
    obsoleteRoot: obsoleteRoot
      ? path.resolve(obsoleteRoot)
      : path.join(localRoot, 'obsolete'),
    flatTree: overrides.flatTree ?? appConfig.flatTree,
    overwrite: overrides.overwrite ?? appConfig.overwrite,
    requestTimeoutMs: appConfig.requestTimeoutMs,
  });
}

let cachedConfig: AppConfig | undefined;

/**
 * Returns the process-wide config, parsed from `process.env` on first use.
 */
export function getConfig(): AppConfig {
  cachedConfig ??= parseConfig(process.env);
  return cachedConfig;
}
