import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { MemoryNotificationSink } from '@/events/memory-sink.js';
import { createServer } from '@/server.js';
import { FsBackend } from '@/storage/fs-backend.js';

import { createTempDataDir, createTestConfig, removeTempDataDir } from '../helpers.js';

describe('Health Endpoint', () => {
  let server: FastifyInstance;
  let dataDir: string;

  beforeAll(async () => {
    dataDir = await createTempDataDir();
    server = await createServer({
      config: createTestConfig(),
      notifications: new MemoryNotificationSink(),
      storage: new FsBackend(dataDir, 'http://mint.test'),
    });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
    await removeTempDataDir(dataDir);
  });

  it('should return 200 with health status', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('healthy');
  });

  it('should include dependency status', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    const body = response.json();
    expect(body.dependencies.notifications.status).toBe('up');
    expect(body.dependencies.storage.status).toBe('up');
  });

  it('should return ISO timestamp', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    const body = response.json();
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
  });

  it('should include version information', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.json().version).toBe('1.0.0');
  });
});
