/**
 * @fileoverview Resolves configuration and services for a CLI invocation.
 * @module src/cli/context
 */
import type { Command } from 'commander';

import {
  buildMirrorConfig,
  getConfig,
  type MirrorConfigOverrides,
} from '@/config/index.js';
import { container, registerServices } from '@/container/index.js';
import { MirrorService } from '@/container/tokens.js';
import type { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import {
  logger,
  requestContextService,
  type RequestContext,
} from '@/utils/index.js';

export type GlobalOptions = {
  root?: string;
  obsoleteRoot?: string;
  server?: string;
  flat?: boolean;
  overwrite?: boolean;
};

export function toMirrorOverrides(
  options: GlobalOptions,
): MirrorConfigOverrides {
  return {
    localRoot: options.root,
    obsoleteRoot: options.obsoleteRoot,
    serverUrl: options.server,
    flatTree: options.flat,
    overwrite: options.overwrite,
  };
}

export interface CommandEnvironment {
  mirrorService: MirrorServiceClass;
  context: RequestContext;
}

/**
 * Reads global options off the root program, wires the container and opens
 * a request context named after the command.
 */
export function prepareCommand(
  command: Command,
  operation: string,
): CommandEnvironment {
  const appConfig = getConfig();
  logger.setLevel(appConfig.logLevel);

  const mirrorConfig = buildMirrorConfig(
    appConfig,
    toMirrorOverrides(command.optsWithGlobals<GlobalOptions>()),
  );
  registerServices(mirrorConfig);

  const context = requestContextService.createRequestContext({
    operation,
    additionalContext: {
      localRoot: mirrorConfig.localRoot,
      obsoleteRoot: mirrorConfig.obsoleteRoot,
    },
  });
  return {
    mirrorService: container.resolve<MirrorServiceClass>(MirrorService),
    context,
  };
}

/**
 * Runs a command body with a prepared environment. Any failure, including
 * invalid configuration, is reported and sets a non-zero exit code.
 */
export async function runCommand(
  command: Command,
  operation: string,
  body: (env: CommandEnvironment) => Promise<void>,
): Promise<void> {
  let env: CommandEnvironment | undefined;
  try {
    env = prepareCommand(command, operation);
    await body(env);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${operation} failed`, {
      ...env?.context,
      error: message,
    });
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}
