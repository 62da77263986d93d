import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { healthRoutesPlugin } from '@/routes/health.js';

/** Mock dependency whose healthy() resolves to `healthy` */
function createMockDependency(healthy = true) {
  return {
    publish: vi.fn(),
    put: vi.fn(),
    get: vi.fn(),
    uriFor: vi.fn(),
    close: vi.fn(),
    healthy: vi.fn().mockResolvedValue(healthy),
  };
}

/**
 * Minimal Fastify server with health routes. A dependency passed as `null`
 * is left undecorated.
 */
async function createHealthServer(options?: {
  notifications?: { healthy: ReturnType<typeof vi.fn> } | Record<string, unknown> | null;
  storage?: { healthy: ReturnType<typeof vi.fn> } | Record<string, unknown> | null;
}): Promise<FastifyInstance> {
  const server = fastify({ logger: false });

  // Cast to 'never' to satisfy Fastify's strict decorator typing -- this is a test mock
  const notifications =
    options?.notifications === undefined ? createMockDependency() : options.notifications;
  if (notifications) {
    server.decorate('notifications', notifications as never);
  }
  const storage = options?.storage === undefined ? createMockDependency() : options.storage;
  if (storage) {
    server.decorate('storage', storage as never);
  }

  await server.register(healthRoutesPlugin);
  await server.ready();
  return server;
}

describe('Health Endpoint', () => {
  let server: FastifyInstance;

  afterEach(async () => {
    if (server) await server.close();
  });

  describe('All dependencies up (healthy)', () => {
    beforeEach(async () => {
      server = await createHealthServer();
    });

    it('should return healthy status with HTTP 200', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('healthy');
    });

    it('should report both dependencies as up with latency', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.dependencies.notifications.status).toBe('up');
      expect(body.dependencies.notifications.latency).toBeGreaterThanOrEqual(0);
      expect(body.dependencies.storage.status).toBe('up');
      expect(body.dependencies.storage.latency).toBeGreaterThanOrEqual(0);
    });
  });

  describe('Notifications down, storage up (degraded)', () => {
    beforeEach(async () => {
      server = await createHealthServer({
        notifications: { healthy: vi.fn().mockRejectedValue(new Error('Connection refused')) },
      });
    });

    it('should return degraded status with HTTP 200', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('degraded');
    });

    it('should report the sink as down with the error message', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.dependencies.notifications.status).toBe('down');
      expect(body.dependencies.notifications.error).toBe('Connection refused');
      expect(body.dependencies.storage.status).toBe('up');
    });
  });

  describe('Storage reporting unhealthy', () => {
    it('should mark storage down without an error message', async () => {
      server = await createHealthServer({ storage: createMockDependency(false) });

      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.status).toBe('degraded');
      expect(body.dependencies.storage).toEqual({
        status: 'down',
        latency: expect.any(Number),
      });
    });
  });

  describe('Everything down (unhealthy)', () => {
    it('should return 503', async () => {
      server = await createHealthServer({
        notifications: createMockDependency(false),
        storage: createMockDependency(false),
      });

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().status).toBe('unhealthy');
    });
  });

  describe('Dependency not configured', () => {
    it('should report a missing sink as down and not configured', async () => {
      server = await createHealthServer({ notifications: null });

      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.status).toBe('degraded');
      expect(body.dependencies.notifications).toEqual({ status: 'down', error: 'Not configured' });
    });
  });

  describe('Non-Error rejection', () => {
    it('should report Unknown error', async () => {
      server = await createHealthServer({
        notifications: { healthy: vi.fn().mockRejectedValue('string error') },
      });

      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.dependencies.notifications.status).toBe('down');
      expect(body.dependencies.notifications.error).toBe('Unknown error');
    });
  });

  describe('Synchronous throw from healthy()', () => {
    it('should be caught and reported as down', async () => {
      const broken = {
        healthy() {
          throw new Error('Unexpected sink failure');
        },
      };
      server = await createHealthServer({ notifications: broken });

      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.dependencies.notifications.status).toBe('down');
      expect(body.dependencies.notifications.error).toBe('Unexpected sink failure');
    });
  });

  describe('Response shape validation', () => {
    beforeEach(async () => {
      server = await createHealthServer();
    });

    it('should return ISO timestamp', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(new Date(body.timestamp).getTime()).not.toBeNaN();
      expect(body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should return uptime as positive number', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(typeof body.uptime).toBe('number');
      expect(body.uptime).toBeGreaterThan(0);
    });

    it('should return the package version', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().version).toBe('1.0.0');
    });
  });
});
