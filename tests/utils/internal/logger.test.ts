/**
 * @fileoverview Unit tests for the application logger.
 * @module tests/utils/internal/logger.test
 */
import { describe, expect, it } from 'vitest';

import { Logger, logger } from '@/utils/internal/logger.js';

describe('logger', () => {
  const context = {
    requestId: 'test-req-1',
    timestamp: new Date().toISOString(),
    operation: 'test',
  };

  it('should expose a single stderr-backed instance', () => {
    expect(Logger.getInstance()).toBe(logger);
  });

  it('should accept a context at every level below the test threshold', () => {
    expect(() => {
      logger.debug('debug record', context);
      logger.info('info record', context);
      logger.notice('notice record', context);
      logger.warning('warning record', context);
      logger.error('error record', new Error('boom'), context);
    }).not.toThrow();
  });
});
