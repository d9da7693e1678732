import type { ServiceConfig } from '../config/serviceConfig';
import { assertUnreachable } from '../errors';
import {
  createPassthroughIdentityDirectory,
  createStaticIdentityDirectory,
  type IdentityDirectory
} from '../identity/directory';
import { createLocalBackend } from './localBackend';
import { createMemoryBackend } from './memoryBackend';
import type { StorageBackend } from './types';

export function createBackend(config: ServiceConfig): StorageBackend {
  const backend = config.backend;
  switch (backend.kind) {
    case 'local':
      return createLocalBackend({ rootDirectory: backend.directory, zone: config.zone });
    case 'memory':
      return createMemoryBackend({
        ownerName: config.defaultOwner,
        ownerZone: config.zone,
        directories: [config.rootPath]
      });
    default:
      return assertUnreachable(backend);
  }
}

export function createIdentityDirectory(config: ServiceConfig): IdentityDirectory {
  const mode = config.identities.mode;
  switch (mode) {
    case 'static':
      return createStaticIdentityDirectory(config.identities.entries);
    case 'passthrough':
      return createPassthroughIdentityDirectory();
    default:
      return assertUnreachable(mode);
  }
}
