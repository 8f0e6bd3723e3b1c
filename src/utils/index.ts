/**
 * @fileoverview Barrel file for shared utilities.
 * @module src/utils
 */

export * from './internal/logger.js';
export * from './internal/requestContext.js';
export * from './network/fetchWithTimeout.js';
export * from './archive/index.js';
