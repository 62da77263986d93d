/**
 * Adversarial tests against the mint intake.
 *
 * Covers malformed input, attempts to steer issuance through request fields,
 * absence of role-management routes, and production error sanitization.
 */

import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';

import { MemoryNotificationSink } from '@/events/memory-sink.js';
import { createServer } from '@/server.js';
import { FsBackend } from '@/storage/fs-backend.js';

import {
  ALICE,
  MINTER,
  OUTSIDER,
  createTempDataDir,
  createTestConfig,
  removeTempDataDir,
} from '../helpers.js';

const validBody = {
  name: 'Sunrise',
  img: 'https://img.example/sunrise.png',
  ethAddress: ALICE,
  description: 'First light',
};

async function startServer(env: 'test' | 'production' = 'test') {
  const dataDir = await createTempDataDir();
  const sink = new MemoryNotificationSink();
  const server = await createServer({
    config: createTestConfig({ env }),
    notifications: sink,
    storage: new FsBackend(dataDir, 'http://mint.test'),
  });
  await server.ready();
  return { server, sink, dataDir };
}

// ===========================================================================
// 1. Malformed Input Handling
// ===========================================================================

describe('Malformed Input Handling', () => {
  let server: FastifyInstance;
  let dataDir: string;

  beforeAll(async () => {
    ({ server, dataDir } = await startServer());
  });

  afterAll(async () => {
    await server.close();
    await removeTempDataDir(dataDir);
  });

  it('should reject invalid JSON with a client error', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/MintNFT',
      headers: { 'content-type': 'application/json' },
      payload: 'not-json{{{',
    });

    expect(response.statusCode).toBe(400);
  });

  it('should treat a JSON array body as missing every field', async () => {
    const response = await server.inject({ method: 'POST', url: '/MintNFT', payload: [] });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.message).toBe(
      'Missing required parameters: name, img, ethAddress, description'
    );
  });

  it('should reject a quantity above uint256 without allocating an id', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/MintNFT',
      payload: { ...validBody, quantity: (2n ** 256n).toString() },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe('AUTHORITY_INVALID_QUANTITY');
    expect(server.authority.nextTokenId).toBe(0n);
  });

  it('should reject a fractional quantity', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/MintNFT',
      payload: { ...validBody, quantity: 1.5 },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe('MINT_INVALID_REQUEST');
  });

  it('should reject a batch larger than 50 items', async () => {
    const item = { name: 'A', img: 'i', description: 'd' };
    const response = await server.inject({
      method: 'POST',
      url: '/MintNFTBatch',
      payload: { ethAddress: ALICE, items: Array.from({ length: 51 }, () => item) },
    });

    expect(response.statusCode).toBe(400);
    expect(server.authority.nextTokenId).toBe(0n);
  });
});

// ===========================================================================
// 2. Issuance Confinement
// ===========================================================================

describe('Issuance Confinement', () => {
  let server: FastifyInstance;
  let sink: MemoryNotificationSink;
  let dataDir: string;

  beforeAll(async () => {
    ({ server, sink, dataDir } = await startServer());
  });

  afterAll(async () => {
    await server.close();
    await removeTempDataDir(dataDir);
  });

  it('should always issue as the configured minter, ignoring caller-supplied fields', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/MintNFT',
      payload: { ...validBody, minter: OUTSIDER, operator: OUTSIDER, caller: OUTSIDER },
    });

    expect(response.statusCode).toBe(201);
    const transfer = sink.events()[0];
    expect(transfer).toMatchObject({ type: 'TransferSingle', operator: MINTER });
  });

  it.each([
    ['POST', '/authority/minters/0x5000000000000000000000000000000000000005'],
    ['DELETE', '/authority/minters/0x2000000000000000000000000000000000000002'],
    ['PUT', '/authority'],
  ] as const)('should expose no role or base-prefix mutation at %s %s', async (method, url) => {
    const response = await server.inject({ method, url });

    expect(response.statusCode).toBe(404);
  });
});

// ===========================================================================
// 3. Production Error Sanitization
// ===========================================================================

describe('Production Error Sanitization', () => {
  let server: FastifyInstance;
  let dataDir: string;

  beforeAll(async () => {
    ({ server, dataDir } = await startServer('production'));
  });

  afterAll(async () => {
    await server.close();
    await removeTempDataDir(dataDir);
  });

  it('should hide unexpected failures behind a generic message', async () => {
    vi.spyOn(server.authority, 'issueSingle').mockImplementationOnce(() => {
      throw new Error('ledger invariant broken in /srv/app/src/authority/ledger.ts:41');
    });

    const response = await server.inject({ method: 'POST', url: '/MintNFT', payload: validBody });

    expect(response.statusCode).toBe(500);
    const body = response.json();
    expect(body.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An internal error occurred',
      statusCode: 500,
    });
    expect(body.error.stack).toBeUndefined();
  });

  it('should still return domain rejections verbatim', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/MintNFT',
      payload: { ...validBody, ethAddress: 'bogus' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.message).toBe('Invalid ethAddress: bogus');
  });

  it('should return a structured 404 without internal paths', async () => {
    const response = await server.inject({ method: 'GET', url: '/admin' });

    expect(response.statusCode).toBe(404);
    expect(response.json().error).toEqual({
      code: 'NOT_FOUND',
      message: 'Route GET:/admin not found',
      statusCode: 404,
    });
  });
});
