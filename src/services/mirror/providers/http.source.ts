/**
 * @fileoverview HTTP(S) archive source backed by fetchWithTimeout.
 * @module src/services/mirror/providers/http.source
 */
import { createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { inject, injectable } from 'tsyringe';

import { MirrorConfigToken } from '@/container/tokens.js';
import {
  fetchWithTimeout,
  logger,
  type RequestContext,
} from '@/utils/index.js';

import type { IArchiveSource } from '../core/IArchiveSource.js';
import type { MirrorConfig } from '../types.js';

@injectable()
export class HttpArchiveSource implements IArchiveSource {
  public readonly name = 'wwPDB HTTPS';

  constructor(@inject(MirrorConfigToken) private config: MirrorConfig) {}

  async readText(url: string, context: RequestContext): Promise<string> {
    return fetchWithTimeout(
      url,
      this.config.requestTimeoutMs,
      context,
      (response) => response.text(),
    );
  }

  /**
   * Streams the response body to `destination`. The request timeout bounds
   * the whole transfer; a partial file may remain when it fails.
   */
  async download(
    url: string,
    destination: string,
    context: RequestContext,
  ): Promise<void> {
    const contentLength = await fetchWithTimeout(
      url,
      this.config.requestTimeoutMs,
      context,
      async (response, signal) => {
        const body =
          response.body === null
            ? Readable.from([])
            : Readable.fromWeb(response.body);
        await pipeline(body, createWriteStream(destination), { signal });
        return response.headers.get('content-length');
      },
    );

    logger.debug('Archive file downloaded', {
      ...context,
      url,
      destination,
      contentLength,
    });
  }
}
