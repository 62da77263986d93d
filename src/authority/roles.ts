// Role identifiers and capability (interface) ids.

import { keccak256, toBytes, zeroHash } from 'viem';
import type { Hex } from 'viem';

import type { RoleId } from './types.js';

/** AdminRole: the all-zero hash, administered by itself */
export const DEFAULT_ADMIN_ROLE: RoleId = zeroHash;

/** MinterRole: keccak256("MINTER_ROLE"), administered by AdminRole */
export const MINTER_ROLE: RoleId = keccak256(toBytes('MINTER_ROLE'));

const ROLE_NAMES: Record<string, string> = {
  [DEFAULT_ADMIN_ROLE]: 'DEFAULT_ADMIN_ROLE',
  [MINTER_ROLE]: 'MINTER_ROLE',
};

/** Human-readable role name for logs and error messages (falls back to the hash) */
export function roleName(role: RoleId): string {
  return ROLE_NAMES[role] ?? role;
}

/**
 * ERC-165 interface ids the authority reports through supportsInterface().
 * The AccessControl and MultiToken ids are advertised as families: the
 * authority exposes role reads plus grantMinter/revokeMinter rather than the
 * generic role mutators, and has no batch transfer.
 */
export const INTERFACE_IDS = {
  ERC165: '0x01ffc9a7',
  AccessControl: '0x7965db0b',
  MultiToken: '0xd9b67a26',
  MultiTokenMetadataUri: '0x0e89341c',
} as const satisfies Record<string, Hex>;

const SUPPORTED_INTERFACES = new Set<string>(Object.values(INTERFACE_IDS));

export function isSupportedInterface(interfaceId: string): boolean {
  return SUPPORTED_INTERFACES.has(interfaceId.toLowerCase());
}
