import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { deployAuthority } from './deploy/deploy-authority.js';
import { attachSink, createNotificationSink } from './events/index.js';
import type { NotificationSink } from './events/types.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { authorityRoutesPlugin } from './routes/authority.js';
import { healthRoutesPlugin } from './routes/health.js';
import { metadataRoutesPlugin } from './routes/metadata.js';
import { mintRoutesPlugin } from './routes/mint.js';
import { rootRoutesPlugin } from './routes/root.js';
import { tokenRoutesPlugin } from './routes/tokens.js';
import { createStorageBackend } from './storage/index.js';
import type { StorageBackend } from './storage/types.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Use this sink instead of building one from config.notifications */
  notifications?: NotificationSink;
  /** Use this backend instead of building one from config.storage */
  storage?: StorageBackend;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Request logging comes from the request-logger plugin
    disableRequestLogging: true,
    // Mint payloads are small JSON documents
    bodyLimit: 51200,
  });

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.decorate('config', config);

  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Token Mint API',
        description: 'Role-gated multi-token issuance with a mint request intake.',
        version: '1.0.0',
      },
      servers: [{ url: config.server.publicUrl, description: 'Configured public URL' }],
      tags: [
        { name: 'Health', description: 'Server health' },
        { name: 'Mint', description: 'Mint request intake' },
        { name: 'Tokens', description: 'Token balances and metadata pointers' },
        { name: 'Authority', description: 'Issuance authority roles and capabilities' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Authority deployment ----
  const deployment = deployAuthority({
    deployer: config.authority.admin,
    minter: config.authority.minter,
    nonce: config.authority.deployNonce,
    baseUri: config.authority.baseUri,
    logger: server.log,
  });
  const { authority, ...record } = deployment;
  server.decorate('authority', authority);
  server.decorate('deployment', record);
  server.log.info(
    { address: record.address, admin: record.deployer, minter: record.minter },
    'Issuance authority deployed'
  );

  // ---- Notification sink ----
  try {
    const notifications =
      options.notifications ?? (await createNotificationSink(config.notifications, server.log));
    server.decorate('notifications', notifications);
    const detach = attachSink(authority, notifications, server.log);

    server.addHook('onClose', async () => {
      detach();
      await notifications.close();
      server.log.info('Notification sink closed');
    });

    server.log.info({ backend: config.notifications.backend }, 'Notification sink initialized');
  } catch (error) {
    server.log.error(
      { err: error instanceof Error ? error.message : 'Unknown error' },
      'Notification sink initialization failed'
    );
    throw error;
  }

  // ---- Storage layer initialization ----
  const storage = options.storage ?? createStorageBackend(config.storage, config.server.publicUrl);
  server.decorate('storage', storage);
  server.log.info({ backend: config.storage.backend }, 'Storage layer initialized');

  // Routes
  await server.register(rootRoutesPlugin);
  await server.register(healthRoutesPlugin);
  await server.register(mintRoutesPlugin);
  await server.register(tokenRoutesPlugin);
  await server.register(authorityRoutesPlugin);
  await server.register(metadataRoutesPlugin);

  return server;
}
