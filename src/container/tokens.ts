/**
 * @fileoverview Injection tokens for the tsyringe container.
 * @module src/container/tokens
 */

export const MirrorConfigToken = Symbol('MirrorConfig');
export const ArchiveSource = Symbol('ArchiveSource');
export const MirrorService = Symbol('MirrorService');
