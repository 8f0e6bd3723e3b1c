/**
 * @fileoverview Builds the MCP server, registers every tool and connects it
 * to the stdio transport.
 * @module src/mcp-server/server
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { APP_NAME, APP_VERSION } from '@/config/index.js';
import { logger, type RequestContext } from '@/utils/index.js';

import { allToolDefinitions } from './tools/definitions/index.js';
import { registerTool } from './tools/utils/toolHandlerFactory.js';

export function createMcpServer(): McpServer {
  const server = new McpServer(
    { name: APP_NAME, version: APP_VERSION },
    { capabilities: { tools: {} } },
  );
  for (const definition of allToolDefinitions) {
    registerTool(server, definition);
  }
  return server;
}

/**
 * Starts serving over stdin/stdout. Resolves once the transport is connected;
 * the process then stays alive until the client closes the stream.
 */
export async function startStdioServer(
  context: RequestContext,
): Promise<McpServer> {
  const server = createMcpServer();
  await server.connect(new StdioServerTransport());
  logger.notice(`${APP_NAME} v${APP_VERSION} listening on stdio`, {
    ...context,
    tools: allToolDefinitions.map((t) => t.name),
  });
  return server;
}
