/**
 * @fileoverview Registers the application's services with the tsyringe container.
 * Must be called once per process, after the mirror configuration is known.
 * @module src/container
 */
import 'reflect-metadata';
import { container, Lifecycle } from 'tsyringe';

import { MirrorService as MirrorServiceClass } from '@/services/mirror/core/MirrorService.js';
import { HttpArchiveSource } from '@/services/mirror/providers/http.source.js';
import type { MirrorConfig } from '@/services/mirror/types.js';

import { ArchiveSource, MirrorConfigToken, MirrorService } from './tokens.js';

export function registerServices(config: MirrorConfig): void {
  container.register(MirrorConfigToken, { useValue: config });
  container.register(
    ArchiveSource,
    { useClass: HttpArchiveSource },
    { lifecycle: Lifecycle.Singleton },
  );
  container.register(
    MirrorService,
    { useClass: MirrorServiceClass },
    { lifecycle: Lifecycle.Singleton },
  );
}

export { container };
