// SDK response schemas for the mint API.
//
// Mint request/response shapes live with the intake module and are re-exported
// here; the read-route shapes are declared below.

import { z } from 'zod';

export {
  MintResponseSchema,
  BatchMintResponseSchema,
  type MintResponse,
  type BatchMintResponse,
} from '../mint/types.js';

export const ApiInfoSchema = z.object({ message: z.string() });

export const TokenResponseSchema = z.object({ id: z.string(), uri: z.string() });

export const BalanceResponseSchema = z.object({
  id: z.string(),
  owner: z.string(),
  balance: z.string(),
});

export const NextTokenIdResponseSchema = z.object({ nextTokenId: z.string() });

export const AuthorityResponseSchema = z.object({
  address: z.string(),
  admin: z.string(),
  minters: z.array(z.string()),
  baseUri: z.string(),
  nextTokenId: z.string(),
  deployedAt: z.string(),
});

/** Error envelope produced by the server's error handler */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    statusCode: z.number(),
  }),
  requestId: z.string(),
  timestamp: z.string(),
});

export type ApiInfo = z.infer<typeof ApiInfoSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type BalanceResponse = z.infer<typeof BalanceResponseSchema>;
export type NextTokenIdResponse = z.infer<typeof NextTokenIdResponseSchema>;
export type AuthorityResponse = z.infer<typeof AuthorityResponseSchema>;

/** Body of POST /MintNFT as sent over the wire */
export interface MintRequestBody {
  name: string;
  img: string;
  ethAddress: string;
  description: string;
  quantity?: string | number;
  claimable?: boolean;
}

/** Body of POST /MintNFTBatch as sent over the wire */
export interface BatchMintRequestBody {
  ethAddress: string;
  claimable?: boolean;
  items: {
    name: string;
    img: string;
    description: string;
    quantity?: string | number;
    price?: string | number;
  }[];
}
