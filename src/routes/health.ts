import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import type { NotificationSink } from '../events/types.js';
import type { StorageBackend } from '../storage/types.js';

// Read version once at startup (not on every request)
const packageJson: { version?: unknown } = JSON.parse(
  readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8')
);
const APP_VERSION = typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  dependencies: Record<string, DependencyStatus>;
}

async function checkDependency(
  dependency: Pick<NotificationSink | StorageBackend, 'healthy'> | undefined
): Promise<DependencyStatus> {
  if (!dependency) {
    return { status: 'down', error: 'Not configured' };
  }
  const start = Date.now();
  try {
    const healthy = await dependency.healthy();
    return {
      status: healthy ? 'up' : 'down',
      latency: Date.now() - start,
    };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    const [notificationStatus, storageStatus] = await Promise.all([
      checkDependency(fastify.hasDecorator('notifications') ? fastify.notifications : undefined),
      checkDependency(fastify.hasDecorator('storage') ? fastify.storage : undefined),
    ]);

    const dependencies: Record<string, DependencyStatus> = {
      notifications: notificationStatus,
      storage: storageStatus,
    };

    const allUp = Object.values(dependencies).every((d) => d.status === 'up');
    const allDown = Object.values(dependencies).every((d) => d.status === 'down');

    let status: HealthResponse['status'];
    if (allUp) {
      status = 'healthy';
    } else if (allDown) {
      status = 'unhealthy';
    } else {
      status = 'degraded';
    }

    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      uptime: process.uptime(),
      dependencies,
    };

    const statusCode = status === 'unhealthy' ? 503 : 200;

    return reply.status(statusCode).send(response);
  });

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
