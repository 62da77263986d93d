// Fastify type augmentation for the mint service

import type { TokenAuthority } from '../authority/token-authority.js';
import type { Config } from '../config/index.js';
import type { DeploymentRecord } from '../deploy/deploy-authority.js';
import type { NotificationSink } from '../events/types.js';
import type { StorageBackend } from '../storage/types.js';

declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    authority: TokenAuthority;
    deployment: DeploymentRecord;
    notifications: NotificationSink;
    storage: StorageBackend;
  }
}
