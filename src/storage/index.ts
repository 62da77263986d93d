// Metadata storage barrel export and factory function.

import { FsBackend } from './fs-backend.js';
import { IpfsBackend } from './ipfs-backend.js';
import type { StorageBackend } from './types.js';

export type { StorageBackend } from './types.js';
export { FsBackend } from './fs-backend.js';
export { IpfsBackend } from './ipfs-backend.js';

export interface StorageConfig {
  backend: 'fs' | 'ipfs';
  fs?: { dataDir: string };
  ipfs?: { apiUrl: string };
}

/**
 * Create a storage backend based on configuration.
 * `publicUrl` is the service's external base URL; fs pointers live under it.
 */
export function createStorageBackend(config: StorageConfig, publicUrl: string): StorageBackend {
  switch (config.backend) {
    case 'ipfs':
      return new IpfsBackend(config.ipfs?.apiUrl);
    case 'fs':
    default:
      return new FsBackend(config.fs?.dataDir ?? './data/metadata', publicUrl);
  }
}
