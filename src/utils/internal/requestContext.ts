/**
 * @fileoverview Creates the per-operation context threaded through services and logs.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

/**
 * Context attached to every log record of one operation.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  operation?: string;
  [key: string]: unknown;
}

export interface CreateRequestContextParams {
  operation: string;
  parentContext?: RequestContext;
  additionalContext?: Record<string, unknown>;
}

export const requestContextService = {
  /**
   * Builds a fresh context. A parent's fields are inherited, but the new
   * context always gets its own requestId and timestamp.
   */
  createRequestContext(params: CreateRequestContextParams): RequestContext {
    return {
      ...params.parentContext,
      ...params.additionalContext,
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
      operation: params.operation,
    };
  },
};
