// Token issuance authority domain types.
//
// Principals are EVM-style addresses (viem `Address`), roles are 32-byte
// identifiers, and every quantity or token id is a uint256 carried as bigint.

import type { Address, Hex } from 'viem';

/** 32-byte role identifier, e.g. keccak256("MINTER_ROLE") */
export type RoleId = Hex;

/** Largest value a uint256 slot can hold */
export const MAX_UINT256 = 2n ** 256n - 1n;

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

export interface RoleGrantedEvent {
  type: 'RoleGranted';
  role: RoleId;
  account: Address;
  sender: Address;
}

export interface RoleRevokedEvent {
  type: 'RoleRevoked';
  role: RoleId;
  account: Address;
  sender: Address;
}

export interface TransferSingleEvent {
  type: 'TransferSingle';
  operator: Address;
  from: Address;
  to: Address;
  id: bigint;
  value: bigint;
}

export interface TransferBatchEvent {
  type: 'TransferBatch';
  operator: Address;
  from: Address;
  to: Address;
  ids: bigint[];
  values: bigint[];
}

export interface ApprovalForAllEvent {
  type: 'ApprovalForAll';
  account: Address;
  operator: Address;
  approved: boolean;
}

export interface UriEvent {
  type: 'URI';
  value: string;
  id: bigint;
}

/**
 * Every notification the authority emits. Field names follow the
 * multi-token and access-control event logs so indexers can map them 1:1.
 */
export type AuthorityEvent =
  | RoleGrantedEvent
  | RoleRevokedEvent
  | TransferSingleEvent
  | TransferBatchEvent
  | ApprovalForAllEvent
  | UriEvent;

export type AuthorityEventType = AuthorityEvent['type'];

export type AuthorityListener = (event: AuthorityEvent) => void;

/**
 * Result of a committed mutating operation: the notifications it emitted,
 * in emission order.
 */
export interface TransactionReceipt {
  events: readonly AuthorityEvent[];
}

/**
 * Receipt of a batch issuance. `prices` echoes the quoted prices; nothing in
 * the ledger reads or stores them.
 */
export interface BatchIssueReceipt extends TransactionReceipt {
  ids: bigint[];
  prices: bigint[];
}

/** The slice of a pino/Fastify logger the authority reports through */
export interface AuthorityLogger {
  error(obj: object, msg: string): void;
}

export interface TokenAuthorityOptions {
  /** Address the authority lives at (assigned by deployment) */
  address?: Address;
  /** Base prefix used by uri() when no per-id pointer is set */
  baseUri?: string;
  /** Receives listener failures; without one they become process warnings */
  logger?: AuthorityLogger;
}
