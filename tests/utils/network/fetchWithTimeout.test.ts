/**
 * @fileoverview Unit tests for fetchWithTimeout.
 * @module tests/utils/network/fetchWithTimeout.test
 */
import { afterEach, describe, expect, it, vi } from 'vitest';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { fetchWithTimeout } from '@/utils/network/fetchWithTimeout.js';

describe('fetchWithTimeout', () => {
  const context = {
    requestId: 'test-req-1',
    timestamp: new Date().toISOString(),
    operation: 'test',
  };
  const url = 'https://archive.test/pub/pdb/data/status/';
  const readText = (response: Response) => response.text();

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return a successful response', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('listing'));
    vi.stubGlobal('fetch', fetchMock);

    const text = await fetchWithTimeout(url, 1000, context, readText);

    expect(text).toBe('listing');
    expect(fetchMock).toHaveBeenCalledWith(
      url,
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('should pass request options through', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(''));
    vi.stubGlobal('fetch', fetchMock);

    await fetchWithTimeout(url, 1000, context, readText, {
      method: 'HEAD',
      headers: { Accept: 'text/plain' },
    });

    expect(fetchMock).toHaveBeenCalledWith(
      url,
      expect.objectContaining({
        method: 'HEAD',
        headers: { Accept: 'text/plain' },
      }),
    );
  });

  it('should map 404 to NotFound', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValue(
          new Response('', { status: 404, statusText: 'Not Found' }),
        ),
    );

    await expect(
      fetchWithTimeout(url, 1000, context, readText),
    ).rejects.toMatchObject({
      code: JsonRpcErrorCode.NotFound,
      message: 'HTTP error! Status: 404 Not Found',
    });
  });

  it('should map other HTTP errors to ServiceUnavailable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        new Response('', { status: 503, statusText: 'Service Unavailable' }),
      ),
    );

    await expect(
      fetchWithTimeout(url, 1000, context, readText),
    ).rejects.toMatchObject({
      code: JsonRpcErrorCode.ServiceUnavailable,
      message: 'HTTP error! Status: 503 Service Unavailable',
    });
  });

  it('should wrap network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockRejectedValue(new TypeError('fetch failed')),
    );

    await expect(
      fetchWithTimeout(url, 1000, context, readText),
    ).rejects.toMatchObject({
      code: JsonRpcErrorCode.ServiceUnavailable,
      message: `Network error during fetch GET ${url}: fetch failed`,
    });
  });

  it('should abort and report a timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_input: string | URL, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const abortError = new Error('This operation was aborted');
              abortError.name = 'AbortError';
              reject(abortError);
            });
          }),
      ),
    );

    const pending = fetchWithTimeout(url, 10, context, readText);

    await expect(pending).rejects.toBeInstanceOf(McpError);
    await expect(pending).rejects.toMatchObject({
      code: JsonRpcErrorCode.Timeout,
      message: `fetch GET ${url} timed out.`,
    });
  });

  it('should keep the timeout running while the body is read', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('partial')));

    const pending = fetchWithTimeout(
      url,
      10,
      context,
      (_response, signal) =>
        new Promise<string>((_resolve, reject) => {
          signal.addEventListener('abort', () => {
            const abortError = new Error('This operation was aborted');
            abortError.name = 'AbortError';
            reject(abortError);
          });
        }),
    );

    await expect(pending).rejects.toMatchObject({
      code: JsonRpcErrorCode.Timeout,
      message: `fetch GET ${url} timed out.`,
    });
  });

  it('should report a broken body transfer as a network error', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('partial')));

    await expect(
      fetchWithTimeout(url, 1000, context, async () => {
        throw new TypeError('terminated');
      }),
    ).rejects.toMatchObject({
      code: JsonRpcErrorCode.ServiceUnavailable,
      message: `Network error during fetch GET ${url}: terminated`,
    });
  });

  it('should let local filesystem errors through unchanged', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('partial')));
    const diskError: NodeJS.ErrnoException = new Error('ENOSPC: no space left');
    diskError.code = 'ENOSPC';
    diskError.syscall = 'write';

    await expect(
      fetchWithTimeout(url, 1000, context, async () => {
        throw diskError;
      }),
    ).rejects.toBe(diskError);
  });
});
