import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, beforeEach, afterAll, vi } from 'vitest';

import { MemoryNotificationSink } from '@/events/memory-sink.js';
import { createServer } from '@/server.js';
import type { StorageBackend } from '@/storage/types.js';

import { createTestConfig } from '../helpers.js';

function createMockStorage() {
  return {
    put: vi.fn<StorageBackend['put']>(),
    get: vi.fn<StorageBackend['get']>().mockResolvedValue(null),
    uriFor: vi.fn<StorageBackend['uriFor']>(),
    healthy: vi.fn<StorageBackend['healthy']>().mockResolvedValue(true),
  } satisfies StorageBackend;
}

describe('GET /metadata/:cid Route', () => {
  let server: FastifyInstance;
  const storage = createMockStorage();

  beforeAll(async () => {
    server = await createServer({
      config: createTestConfig(),
      notifications: new MemoryNotificationSink(),
      storage,
    });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    storage.get.mockReset();
    storage.get.mockResolvedValue(null);
  });

  it('should return 200 with the stored JSON document', async () => {
    storage.get.mockResolvedValue(Buffer.from('{"name":"A","description":"d","image":"i"}'));

    const response = await server.inject({ method: 'GET', url: '/metadata/abc123' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.json()).toEqual({ name: 'A', description: 'd', image: 'i' });
    expect(storage.get).toHaveBeenCalledWith('abc123');
  });

  it('should return 404 for unknown content', async () => {
    const response = await server.inject({ method: 'GET', url: '/metadata/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Not Found', message: 'Metadata not found' });
  });

  it('should return 500 when the backend throws', async () => {
    storage.get.mockRejectedValue(new Error('EACCES /var/data'));

    const response = await server.inject({ method: 'GET', url: '/metadata/abc123' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: 'Internal Server Error',
      message: 'Failed to retrieve metadata',
    });
  });
});
