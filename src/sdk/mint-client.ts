// MintClient -- HTTP wrapper for the mint API.
//
// Uses native fetch (Node 20+) with AbortController timeout and Zod
// validation of every response body.

import type { z } from 'zod';

import {
  ApiInfoSchema,
  AuthorityResponseSchema,
  BalanceResponseSchema,
  BatchMintResponseSchema,
  ErrorResponseSchema,
  MintResponseSchema,
  NextTokenIdResponseSchema,
  TokenResponseSchema,
} from './types.js';
import type {
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

export interface MintClientOptions {
  /** Base URL of the mint API (e.g. "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Additional headers to send with every request */
  headers?: Record<string, string>;
}

/** Non-2xx response from the mint API */
export class MintApiError extends Error {
  readonly status: number;
  /** Server error code (e.g. MINT_MISSING_PARAMETERS), when the body carried one */
  readonly code: string | undefined;

  constructor(status: number, statusText: string, code?: string, detail?: string) {
    super(`Mint API returned ${status} ${statusText}${code ? ` (${code}): ${detail ?? ''}` : ''}`);
    this.name = 'MintApiError';
    this.status = status;
    this.code = code;
  }
}

export class MintClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(options: MintClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? 30_000;
    this.headers = options.headers ?? {};
  }

  /** GET / */
  async info(): Promise<ApiInfo> {
    return this.request('GET', '/', undefined, ApiInfoSchema);
  }

  /** POST /MintNFT */
  async mint(request: MintRequestBody): Promise<MintResponse> {
    return this.request('POST', '/MintNFT', request, MintResponseSchema);
  }

  /** POST /MintNFTBatch */
  async mintBatch(request: BatchMintRequestBody): Promise<BatchMintResponse> {
    return this.request('POST', '/MintNFTBatch', request, BatchMintResponseSchema);
  }

  /** GET /tokens/:id */
  async token(id: bigint | string): Promise<TokenResponse> {
    return this.request('GET', `/tokens/${id.toString()}`, undefined, TokenResponseSchema);
  }

  /** GET /tokens/:id/balance/:owner */
  async balance(id: bigint | string, owner: string): Promise<BalanceResponse> {
    return this.request(
      'GET',
      `/tokens/${id.toString()}/balance/${encodeURIComponent(owner)}`,
      undefined,
      BalanceResponseSchema
    );
  }

  /** GET /tokens/next-id */
  async nextTokenId(): Promise<NextTokenIdResponse> {
    return this.request('GET', '/tokens/next-id', undefined, NextTokenIdResponseSchema);
  }

  /** GET /authority */
  async authority(): Promise<AuthorityResponse> {
    return this.request('GET', '/authority', undefined, AuthorityResponseSchema);
  }

  // ---- Private helpers ----

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    schema: z.ZodType<T>
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method,
        headers:
          body === undefined
            ? { ...this.headers }
            : { 'Content-Type': 'application/json', ...this.headers },
        ...(body !== undefined && { body: JSON.stringify(body) }),
        signal: controller.signal,
      });

      const json: unknown = await response.json().catch(() => undefined);

      if (!response.ok) {
        const envelope = ErrorResponseSchema.safeParse(json);
        if (envelope.success) {
          throw new MintApiError(
            response.status,
            response.statusText,
            envelope.data.error.code,
            envelope.data.error.message
          );
        }
        throw new MintApiError(response.status, response.statusText);
      }

      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new Error(`Invalid mint API response: ${parsed.error.message}`);
      }

      return parsed.data;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Mint API request to ${path} timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
