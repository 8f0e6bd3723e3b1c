/**
 * @fileoverview Contract for the remote side of the mirror: reading listings
 * and downloading archive files.
 * @module src/services/mirror/core/IArchiveSource
 */

import type { RequestContext } from '@/utils/index.js';

export interface IArchiveSource {
  /**
   * Human-readable source name
   */
  readonly name: string;

  /**
   * Read a remote text resource (directory listing or index file)
   * @param url - Absolute URL of the resource
   * @param context - Request context for tracing and logging
   * @throws {McpError} NotFound for a missing resource, ServiceUnavailable or Timeout otherwise
   */
  readText(url: string, context: RequestContext): Promise<string>;

  /**
   * Download a remote file byte-for-byte to a local path
   * @throws {McpError} NotFound for a missing resource, ServiceUnavailable or Timeout otherwise
   */
  download(
    url: string,
    destination: string,
    context: RequestContext,
  ): Promise<void>;
}
