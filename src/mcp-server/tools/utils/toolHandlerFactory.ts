/**
 * @fileoverview Bridges declarative tool definitions to the SDK: validates
 * input, runs the logic with a fresh request context and shapes the result.
 * @module src/mcp-server/tools/utils/toolHandlerFactory
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, requestContextService } from '@/utils/index.js';

import type { AnyToolDefinition, SdkContext } from './toolDefinition.js';

function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) return error;
  if (error instanceof ZodError) {
    return new McpError(
      JsonRpcErrorCode.ValidationError,
      `Invalid input: ${error.issues.map((issue) => issue.message).join('; ')}`,
      { issues: error.issues },
    );
  }
  return new McpError(
    JsonRpcErrorCode.InternalError,
    error instanceof Error ? error.message : String(error),
  );
}

export function createToolHandler(definition: AnyToolDefinition) {
  return async (
    args: unknown,
    sdkContext: SdkContext,
  ): Promise<CallToolResult> => {
    const appContext = requestContextService.createRequestContext({
      operation: 'HandleToolRequest',
      additionalContext: { toolName: definition.name },
    });

    try {
      const input = await definition.inputSchema.parseAsync(args);
      const result = await definition.logic(input, appContext, sdkContext);
      return {
        structuredContent: { ...result },
        content: definition.responseFormatter?.(result) ?? [
          { type: 'text', text: JSON.stringify(result, null, 2) },
        ],
      };
    } catch (error) {
      const mcpError = toMcpError(error);
      logger.error(`Tool ${definition.name} failed`, mcpError, {
        ...appContext,
        code: mcpError.code,
      });
      return {
        isError: true,
        content: [{ type: 'text', text: `Error: ${mcpError.message}` }],
      };
    }
  };
}

export function registerTool(
  server: McpServer,
  definition: AnyToolDefinition,
): void {
  const handler = createToolHandler(definition);
  server.registerTool(
    definition.name,
    {
      title: definition.title ?? definition.name,
      description: definition.description,
      inputSchema: definition.inputSchema.shape,
      outputSchema: definition.outputSchema.shape,
      annotations: definition.annotations,
    },
    (args, extra) => handler(args, extra),
  );
  logger.debug(`Registered tool ${definition.name}`);
}
