// Token metadata publishing.
//
// Builds the metadata document for a mint request, stores it in the
// configured backend, and returns the pointer to record on the token.

import type { TokenMetadata } from './types.js';
import { StorageWriteError } from '../errors/index.js';
import type { StorageBackend } from '../storage/types.js';

export interface PublishedMetadata {
  cid: string;
  uri: string;
}

export function buildMetadata(input: { name: string; description: string; img: string }): TokenMetadata {
  return { name: input.name, description: input.description, image: input.img };
}

/** Store `metadata` as JSON. Backend failures surface as StorageWriteError. */
export async function publishMetadata(
  storage: StorageBackend,
  metadata: TokenMetadata
): Promise<PublishedMetadata> {
  const document = Buffer.from(JSON.stringify(metadata), 'utf-8');
  let cid: string;
  try {
    cid = await storage.put(document);
  } catch (error) {
    throw new StorageWriteError(error instanceof Error ? error.message : 'Unknown error');
  }
  return { cid, uri: storage.uriFor(cid) };
}
