import { isAddress } from 'viem';
import type { Address } from 'viem';
import { z } from 'zod';

/** 20-byte hex address (checksum not enforced) */
export const AddressSchema = z.custom<Address>(
  (value) => typeof value === 'string' && isAddress(value, { strict: false }),
  'Must be a 0x-prefixed 20-byte hex address'
);

export const AuthorityConfigSchema = z.object({
  /** Deploying principal; becomes the permanent admin */
  admin: AddressSchema,
  /** Initial MinterRole holder; the intake service issues tokens as this principal */
  minter: AddressSchema,
  /** Deployer nonce used to derive the authority address */
  deployNonce: z.number().int().min(0).default(0),
  /** Prefix uri() falls back to when a token has no pointer */
  baseUri: z.string().default(''),
  /** Default claimable flag for intake requests that do not set one */
  claimable: z.boolean().default(false),
});

export const NotificationsConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis']).default('memory'),
    /** Pub/sub channel for the redis backend */
    channel: z.string().min(1).default('token-authority:events'),
    /** Retained events for the memory backend */
    memoryCapacity: z.number().int().min(1).default(1000),
    redis: z
      .object({
        host: z.string().default('127.0.0.1'),
        port: z.number().int().min(1).max(65535).default(6379),
        /** Redis password (sensitive - never log). Optional for local dev. */
        password: z.string().optional(),
        /** Redis username (Redis 6+ ACL). Optional. */
        username: z.string().optional(),
        /** Redis database number (0-15). Default 0. */
        db: z.number().int().min(0).max(15).default(0),
      })
      .default(() => ({ host: '127.0.0.1', port: 6379, db: 0 })),
  })
  .default(() => ({
    backend: 'memory' as const,
    channel: 'token-authority:events',
    memoryCapacity: 1000,
    redis: { host: '127.0.0.1', port: 6379, db: 0 },
  }));

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
      /** Externally reachable base URL, used for fs-backed metadata pointers */
      publicUrl: z.string().url().default('http://localhost:3000'),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000, publicUrl: 'http://localhost:3000' })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      sensitive: z.number().int().min(1).default(20),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, sensitive: 20, windowMs: 60000 })),

  // Issuance authority deployment parameters
  authority: AuthorityConfigSchema,

  // Where authority notifications go
  notifications: NotificationsConfigSchema,

  // Metadata storage backend (defaults to filesystem)
  storage: z
    .object({
      backend: z.enum(['fs', 'ipfs']).default('fs'),
      fs: z
        .object({
          /** Directory for stored metadata documents (default: ./data/metadata) */
          dataDir: z.string().default('./data/metadata'),
        })
        .default(() => ({ dataDir: './data/metadata' })),
      ipfs: z
        .object({
          /** IPFS Kubo HTTP API URL (default: http://localhost:5001) */
          apiUrl: z.string().url().default('http://localhost:5001'),
        })
        .default(() => ({ apiUrl: 'http://localhost:5001' })),
    })
    .default(() => ({
      backend: 'fs' as const,
      fs: { dataDir: './data/metadata' },
      ipfs: { apiUrl: 'http://localhost:5001' },
    })),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AuthorityConfig = z.infer<typeof AuthorityConfigSchema>;
export type NotificationsConfig = z.infer<typeof NotificationsConfigSchema>;
