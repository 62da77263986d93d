// Shared test fixtures.
//
// Addresses use decimal digits only, so their checksummed form equals the
// literal and assertions can compare strings directly.

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { Address } from 'viem';

import type { Config } from '@/config/index.js';

export const ADMIN: Address = '0x1000000000000000000000000000000000000001';
export const MINTER: Address = '0x2000000000000000000000000000000000000002';
export const ALICE: Address = '0x3000000000000000000000000000000000000003';
export const BOB: Address = '0x4000000000000000000000000000000000000004';
export const OUTSIDER: Address = '0x5000000000000000000000000000000000000005';

export function createTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    server: { host: '0.0.0.0', port: 0, publicUrl: 'http://mint.test' },
    logging: { level: 'error', pretty: false },
    rateLimit: { global: 100, windowMs: 60000, sensitive: 20 },
    env: 'test',
    authority: {
      admin: ADMIN,
      minter: MINTER,
      deployNonce: 0,
      baseUri: 'https://meta.example/',
      claimable: false,
    },
    notifications: {
      backend: 'memory',
      channel: 'token-authority:events',
      memoryCapacity: 100,
      redis: { host: '127.0.0.1', port: 6379, db: 0 },
    },
    storage: {
      backend: 'fs',
      fs: { dataDir: './data/test-metadata' },
      ipfs: { apiUrl: 'http://localhost:5001' },
    },
    ...overrides,
  };
}

/** Fresh metadata directory under the OS temp dir */
export async function createTempDataDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'mint-it-'));
}

export async function removeTempDataDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
