// Mint intake wire types.
//
// Request fields mirror what wallets and front ends already send
// (name, img, ethAddress, description). Quantities and prices travel as
// decimal strings so uint256 values survive JSON.

import { z } from 'zod';

/** Decimal uint string or non-negative safe integer, parsed to bigint */
export const UintSchema = z
  .union([z.string().regex(/^\d+$/, 'Must be a decimal integer string'), z.number().int().min(0)])
  .transform((value) => BigInt(value));

export const REQUIRED_MINT_FIELDS = ['name', 'img', 'ethAddress', 'description'] as const;

export const MintRequestSchema = z.object({
  name: z.string().min(1),
  img: z.string().min(1),
  ethAddress: z.string().min(1),
  description: z.string().min(1),
  /** Units to issue (default 1: a unique item) */
  quantity: UintSchema.default(1n),
  /** Pre-approve the service minter as operator (default from config) */
  claimable: z.boolean().optional(),
});

export const BatchMintItemSchema = z.object({
  name: z.string().min(1),
  img: z.string().min(1),
  description: z.string().min(1),
  quantity: UintSchema.default(1n),
  price: UintSchema.default(0n),
});

export const BatchMintRequestSchema = z.object({
  ethAddress: z.string().min(1),
  claimable: z.boolean().optional(),
  items: z.array(BatchMintItemSchema).min(1).max(50),
});

/** Metadata document published for every issued token */
export const TokenMetadataSchema = z.object({
  name: z.string(),
  description: z.string(),
  image: z.string(),
});

export type MintRequest = z.infer<typeof MintRequestSchema>;
export type BatchMintItem = z.infer<typeof BatchMintItemSchema>;
export type BatchMintRequest = z.infer<typeof BatchMintRequestSchema>;
export type TokenMetadata = z.infer<typeof TokenMetadataSchema>;

// ---------------------------------------------------------------------------
// Responses (bigints rendered as decimal strings)
// ---------------------------------------------------------------------------

export const MintResponseSchema = z.object({
  tokenId: z.string(),
  receiver: z.string(),
  quantity: z.string(),
  uri: z.string(),
  claimable: z.boolean(),
  metadataCid: z.string(),
});

export const BatchMintResponseSchema = z.object({
  receiver: z.string(),
  claimable: z.boolean(),
  tokens: z.array(
    z.object({
      tokenId: z.string(),
      quantity: z.string(),
      price: z.string(),
      uri: z.string(),
      metadataCid: z.string(),
    })
  ),
});

export type MintResponse = z.infer<typeof MintResponseSchema>;
export type BatchMintResponse = z.infer<typeof BatchMintResponseSchema>;
