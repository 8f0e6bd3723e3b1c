/**
 * @fileoverview Provides a utility function to make fetch requests with a specified timeout.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { isErrnoException } from '@/utils/archive/index.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Fetch options accepted by fetchWithTimeout. The abort signal is owned by the utility.
 */
export type FetchWithTimeoutOptions = Omit<RequestInit, 'signal'>;

/**
 * Consumes a successful response. Runs under the request's abort signal, so
 * the timeout covers the body transfer as well as the headers.
 */
export type ResponseReader<T> = (
  response: Response,
  signal: AbortSignal,
) => Promise<T>;

/**
 * Fetches a resource and reads its body, aborting once `timeoutMs` elapses.
 *
 * Non-2xx responses are turned into errors: 404 becomes `NotFound` so callers
 * can tell a missing archive file from an unreachable host; every other
 * status becomes `ServiceUnavailable`.
 *
 * @returns Whatever `readBody` produces from the response.
 * @throws {McpError} On timeout, network failure or non-2xx status. Local
 * filesystem errors raised by `readBody` propagate unchanged.
 */
export async function fetchWithTimeout<T>(
  url: string | URL,
  timeoutMs: number,
  context: RequestContext,
  readBody: ResponseReader<T>,
  options: FetchWithTimeoutOptions = {},
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const urlString = url.toString();
  const operationDescription = `fetch ${options.method ?? 'GET'} ${urlString}`;

  logger.debug(
    `Attempting ${operationDescription} with ${timeoutMs}ms timeout.`,
    context,
  );

  try {
    let response: Response;
    try {
      response = await fetch(url, { ...options, signal: controller.signal });
    } catch (error) {
      throw toTransferError(error, operationDescription, timeoutMs, context);
    }

    logger.debug(`Fetched ${urlString}. Status: ${response.status}`, context);

    if (!response.ok) {
      const errorData = {
        requestId: context.requestId,
        url: urlString,
        errorSource: 'FetchHttpError',
        statusCode: response.status,
        statusText: response.statusText,
      };
      logger.error(
        `Fetch failed for ${urlString} with status ${response.status}.`,
        { ...context, ...errorData },
      );
      throw new McpError(
        response.status === 404
          ? JsonRpcErrorCode.NotFound
          : JsonRpcErrorCode.ServiceUnavailable,
        `HTTP error! Status: ${response.status} ${response.statusText}`,
        errorData,
      );
    }

    try {
      return await readBody(response, controller.signal);
    } catch (error) {
      if (error instanceof McpError) throw error;
      if (isErrnoException(error) && error.syscall !== undefined) throw error;
      throw toTransferError(error, operationDescription, timeoutMs, context);
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

function toTransferError(
  error: unknown,
  operationDescription: string,
  timeoutMs: number,
  context: RequestContext,
): McpError {
  if (error instanceof Error && error.name === 'AbortError') {
    logger.error(`${operationDescription} timed out after ${timeoutMs}ms.`, {
      ...context,
      errorSource: 'FetchTimeout',
    });
    return new McpError(
      JsonRpcErrorCode.Timeout,
      `${operationDescription} timed out.`,
      { requestId: context.requestId, errorSource: 'FetchTimeout' },
    );
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  const originalErrorName = error instanceof Error ? error.name : 'UnknownError';
  logger.error(`Network error during ${operationDescription}: ${errorMessage}`, {
    ...context,
    originalErrorName,
    errorSource: 'FetchNetworkError',
  });
  return new McpError(
    JsonRpcErrorCode.ServiceUnavailable,
    `Network error during ${operationDescription}: ${errorMessage}`,
    {
      requestId: context.requestId,
      originalErrorName,
      errorSource: 'FetchNetworkError',
    },
  );
}
