/**
 * @fileoverview `serve` command: expose the mirror as MCP tools over stdio.
 * @module src/cli/commands/serve
 */
import type { Command } from 'commander';

import { startStdioServer } from '@/mcp-server/server.js';

import { runCommand } from '../context.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run as an MCP server on stdin/stdout')
    .action(async (_options: unknown, command: Command) =>
      runCommand(command, 'ServerStartup', async ({ context }) => {
        await startStdioServer(context);
      }),
    );
}
