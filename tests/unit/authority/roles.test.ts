import { zeroHash } from 'viem';
import { describe, it, expect } from 'vitest';

import {
  DEFAULT_ADMIN_ROLE,
  INTERFACE_IDS,
  MINTER_ROLE,
  isSupportedInterface,
  roleName,
} from '@/authority/roles.js';

describe('roles', () => {
  it('should use the zero hash for AdminRole', () => {
    expect(DEFAULT_ADMIN_ROLE).toBe(zeroHash);
  });

  it('should derive MinterRole from keccak256("MINTER_ROLE")', () => {
    expect(MINTER_ROLE).toBe('0x9f2df0fed2c77648de5860a4cc508cd0818c85b8b8a1ab4ceeef8d981c8956a6');
  });

  it('should name known roles and fall back to the hash', () => {
    expect(roleName(DEFAULT_ADMIN_ROLE)).toBe('DEFAULT_ADMIN_ROLE');
    expect(roleName(MINTER_ROLE)).toBe('MINTER_ROLE');
    const other = '0x1111111111111111111111111111111111111111111111111111111111111111';
    expect(roleName(other)).toBe(other);
  });
});

describe('isSupportedInterface()', () => {
  it('should accept every advertised interface id', () => {
    for (const id of Object.values(INTERFACE_IDS)) {
      expect(isSupportedInterface(id)).toBe(true);
    }
  });

  it('should compare ids case-insensitively', () => {
    expect(isSupportedInterface('0x7965DB0B')).toBe(true);
  });

  it('should reject the invalid id and unknown ids', () => {
    expect(isSupportedInterface('0xffffffff')).toBe(false);
    expect(isSupportedInterface('0x80ac58cd')).toBe(false);
    expect(isSupportedInterface('')).toBe(false);
  });
});
