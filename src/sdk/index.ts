// SDK barrel export -- public API for mint API consumers

export { MintClient, MintApiError } from './mint-client.js';
export type { MintClientOptions } from './mint-client.js';
export type {
  ApiInfo,
  AuthorityResponse,
  BalanceResponse,
  BatchMintRequestBody,
  BatchMintResponse,
  MintRequestBody,
  MintResponse,
  NextTokenIdResponse,
  TokenResponse,
} from './types.js';
export {
  ApiInfoSchema,
  AuthorityResponseSchema,
  BalanceResponseSchema,
  BatchMintResponseSchema,
  ErrorResponseSchema,
  MintResponseSchema,
  NextTokenIdResponseSchema,
  TokenResponseSchema,
} from './types.js';
