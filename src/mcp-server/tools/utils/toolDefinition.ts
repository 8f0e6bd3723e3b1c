/**
 * @fileoverview Shape of a declarative tool definition: schemas, pure logic
 * and an optional formatter for the human-readable response.
 * @module src/mcp-server/tools/utils/toolDefinition
 */
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  ContentBlock,
  ServerNotification,
  ServerRequest,
  ToolAnnotations,
} from '@modelcontextprotocol/sdk/types.js';
import type { z, ZodObject, ZodRawShape } from 'zod';

import type { RequestContext } from '@/utils/index.js';

export type { ToolAnnotations };

/**
 * Request-scoped helpers the SDK hands to every tool call.
 */
export type SdkContext = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface ToolDefinition<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
> {
  /** Programmatic name, unique within the server. */
  name: string;
  /** Display name for UIs. */
  title?: string;
  /** Description read by the model to decide when to call the tool. */
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations?: ToolAnnotations;
  /**
   * Business logic. Receives already-validated input and throws McpError on failure.
   */
  logic(
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ): Promise<z.infer<TOutputSchema>>;
  /**
   * Builds the text content shown to the client. Defaults to pretty JSON.
   */
  responseFormatter?(result: z.infer<TOutputSchema>): ContentBlock[];
}

/**
 * Any tool definition, for registries that hold tools with differing schemas.
 */
export type AnyToolDefinition = ToolDefinition<
  ZodObject<ZodRawShape>,
  ZodObject<ZodRawShape>
>;
