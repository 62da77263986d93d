// Mint intake orchestrator.
//
// Turns a validated intake request into an issuance:
//   1. check required fields and the receiver address
//   2. publish the metadata document(s) to storage
//   3. issue through the authority as the service minter
//   4. read the allocated id(s) back from the receipt

import type { FastifyBaseLogger } from 'fastify';
import { getAddress, isAddress } from 'viem';
import type { Address } from 'viem';

import { buildMetadata, publishMetadata } from './metadata.js';
import type { PublishedMetadata } from './metadata.js';
import { BatchMintRequestSchema, MintRequestSchema, REQUIRED_MINT_FIELDS } from './types.js';
import type { BatchMintResponse, MintResponse } from './types.js';
import type { TokenAuthority } from '../authority/token-authority.js';
import type { TransferSingleEvent } from '../authority/types.js';
import {
  MintInvalidAddressError,
  MintInvalidRequestError,
  MintMissingParametersError,
} from '../errors/index.js';
import type { StorageBackend } from '../storage/types.js';

export interface MintContext {
  authority: TokenAuthority;
  storage: StorageBackend;
  /** Principal the service issues as; must hold MinterRole */
  minter: Address;
  /** Claimable flag for requests that do not set one */
  defaultClaimable: boolean;
  logger: FastifyBaseLogger;
}

/** Names of required fields that are absent or empty in `body` */
export function missingMintFields(body: unknown): string[] {
  const fields = new Map<string, unknown>(
    typeof body === 'object' && body !== null ? Object.entries(body) : []
  );
  return REQUIRED_MINT_FIELDS.filter((field) => {
    const value = fields.get(field);
    return typeof value !== 'string' || value.length === 0;
  });
}

function parseReceiver(ethAddress: string): Address {
  if (!isAddress(ethAddress, { strict: false })) {
    throw new MintInvalidAddressError(ethAddress);
  }
  return getAddress(ethAddress);
}

function describeIssues(issues: readonly { path: PropertyKey[]; message: string }[]): string {
  return issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`).join(', ');
}

export async function mintSingle(ctx: MintContext, body: unknown): Promise<MintResponse> {
  const missing = missingMintFields(body);
  if (missing.length > 0) {
    throw new MintMissingParametersError(missing.join(', '));
  }

  const parsed = MintRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new MintInvalidRequestError(describeIssues(parsed.error.issues));
  }

  const request = parsed.data;
  const receiver = parseReceiver(request.ethAddress);
  const claimable = request.claimable ?? ctx.defaultClaimable;

  const metadata = await publishMetadata(ctx.storage, buildMetadata(request));

  const receipt = ctx.authority.issueSingle(
    ctx.minter,
    receiver,
    claimable,
    request.quantity,
    metadata.uri
  );
  const transfer = receipt.events.find(
    (event): event is TransferSingleEvent => event.type === 'TransferSingle'
  );
  if (!transfer) {
    throw new Error('Issuance receipt carried no TransferSingle notification');
  }

  ctx.logger.info(
    { tokenId: transfer.id.toString(), receiver, quantity: request.quantity.toString(), claimable },
    'Token issued'
  );

  return {
    tokenId: transfer.id.toString(),
    receiver,
    quantity: transfer.value.toString(),
    uri: ctx.authority.uri(transfer.id),
    claimable,
    metadataCid: metadata.cid,
  };
}

export async function mintBatch(ctx: MintContext, body: unknown): Promise<BatchMintResponse> {
  const parsed = BatchMintRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new MintInvalidRequestError(describeIssues(parsed.error.issues));
  }

  const request = parsed.data;
  const receiver = parseReceiver(request.ethAddress);
  const claimable = request.claimable ?? ctx.defaultClaimable;

  // Sequential: storage backends are not assumed to tolerate parallel writes
  const published: PublishedMetadata[] = [];
  for (const item of request.items) {
    published.push(await publishMetadata(ctx.storage, buildMetadata(item)));
  }

  const quantities = request.items.map((item) => item.quantity);
  const prices = request.items.map((item) => item.price);
  const receipt = ctx.authority.issueBatch(
    ctx.minter,
    receiver,
    claimable,
    quantities,
    prices,
    published.map((metadata) => metadata.uri)
  );

  ctx.logger.info(
    { receiver, count: receipt.ids.length, firstTokenId: receipt.ids[0]?.toString(), claimable },
    'Token batch issued'
  );

  return {
    receiver,
    claimable,
    tokens: receipt.ids.map((id, i) => ({
      tokenId: id.toString(),
      quantity: (quantities[i] ?? 0n).toString(),
      price: (receipt.prices[i] ?? 0n).toString(),
      uri: ctx.authority.uri(id),
      metadataCid: published[i]?.cid ?? '',
    })),
  };
}
