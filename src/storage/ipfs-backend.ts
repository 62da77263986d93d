// IPFS metadata backend on a Kubo node's HTTP API.
//
// Documents are added with CIDv1 and pinned, and pointers are ipfs:// URIs so
// wallets and indexers can resolve them through any gateway.

import { z } from 'zod';

import type { StorageBackend } from './types.js';

const AddResponseSchema = z.object({
  Name: z.string().optional(),
  Hash: z.string().min(1),
  Size: z.string().optional(),
});

export class IpfsBackend implements StorageBackend {
  private readonly apiUrl: string;
  private readonly timeoutMs: number;

  constructor(apiUrl = 'http://localhost:5001', timeoutMs = 10_000) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
    this.timeoutMs = timeoutMs;
  }

  async put(data: Buffer): Promise<string> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(data)], { type: 'application/json' }), 'metadata.json');

    const response = await this.call('add', { 'cid-version': '1', pin: 'true' }, form);
    if (!response.ok) {
      throw new Error(`IPFS add failed: ${response.status} ${response.statusText}`);
    }

    const parsed = AddResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('IPFS add returned an unexpected response');
    }
    return parsed.data.Hash;
  }

  async get(cid: string): Promise<Buffer | null> {
    try {
      const response = await this.call('cat', { arg: cid });
      if (!response.ok) {
        return null;
      }
      return Buffer.from(await response.arrayBuffer());
    } catch {
      return null;
    }
  }

  uriFor(cid: string): string {
    return `ipfs://${cid}`;
  }

  async healthy(): Promise<boolean> {
    try {
      const response = await this.call('id', {});
      return response.ok;
    } catch {
      return false;
    }
  }

  // Kubo accepts POST only on /api/v0
  private call(command: string, params: Record<string, string>, body?: FormData): Promise<Response> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.apiUrl}/api/v0/${command}${query ? `?${query}` : ''}`;
    return fetch(url, {
      method: 'POST',
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}
