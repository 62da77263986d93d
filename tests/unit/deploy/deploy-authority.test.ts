import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { getContractAddress } from 'viem';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { DEFAULT_ADMIN_ROLE } from '@/authority/roles.js';
import { deployAuthority, writeDeploymentRecord } from '@/deploy/deploy-authority.js';

import { ADMIN, ALICE, MINTER } from '../../helpers.js';

describe('deployAuthority()', () => {
  it('should derive the address from deployer and nonce', () => {
    const deployment = deployAuthority({ deployer: ADMIN, minter: MINTER, nonce: 3 });

    expect(deployment.address).toBe(getContractAddress({ from: ADMIN, nonce: 3n }));
    expect(deployment.authority.address).toBe(deployment.address);
  });

  it('should be deterministic for the same inputs', () => {
    const a = deployAuthority({ deployer: ADMIN, minter: MINTER, nonce: 1 });
    const b = deployAuthority({ deployer: ADMIN, minter: MINTER, nonce: 1 });

    expect(a.address).toBe(b.address);
  });

  it('should produce a different address for another nonce', () => {
    const a = deployAuthority({ deployer: ADMIN, minter: MINTER, nonce: 0 });
    const b = deployAuthority({ deployer: ADMIN, minter: MINTER, nonce: 1 });

    expect(a.address).not.toBe(b.address);
  });

  it('should make the deployer admin and grant the initial minter', () => {
    const { authority } = deployAuthority({ deployer: ADMIN, minter: MINTER, baseUri: 'ipfs://x/' });

    expect(authority.hasRole(DEFAULT_ADMIN_ROLE, ADMIN)).toBe(true);
    expect(authority.minters()).toEqual([MINTER]);
    expect(authority.baseUri).toBe('ipfs://x/');
  });

  it('should hand the logger to the authority for listener failures', () => {
    const logger = { error: vi.fn() };
    const { authority } = deployAuthority({ deployer: ADMIN, minter: MINTER, logger });
    authority.subscribe(() => {
      throw new Error('sink offline');
    });

    authority.grantMinter(ADMIN, ALICE);

    expect(logger.error).toHaveBeenCalledWith(
      { err: 'sink offline', event: 'RoleGranted' },
      'Authority listener failed'
    );
  });

  it('should default nonce to 0 and base uri to empty', () => {
    const deployment = deployAuthority({ deployer: ADMIN, minter: MINTER });

    expect(deployment.nonce).toBe(0);
    expect(deployment.baseUri).toBe('');
    expect(deployment.address).toBe(getContractAddress({ from: ADMIN, nonce: 0n }));
  });
});

describe('writeDeploymentRecord()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mint-deploy-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the record without the authority instance', async () => {
    const deployment = deployAuthority({ deployer: ADMIN, minter: MINTER, nonce: 2 });

    const filePath = await writeDeploymentRecord(join(dir, 'deployments'), 'test', deployment);

    expect(filePath).toBe(join(dir, 'deployments', 'test.json'));
    const written: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(written).toEqual({
      address: deployment.address,
      deployer: ADMIN,
      minter: MINTER,
      nonce: 2,
      baseUri: '',
      deployedAt: deployment.deployedAt,
    });
  });

  it('should end the file with a newline', async () => {
    const deployment = deployAuthority({ deployer: ADMIN, minter: MINTER });
    const filePath = await writeDeploymentRecord(dir, 'dev', deployment);

    const raw = await readFile(filePath, 'utf-8');
    expect(raw.endsWith('}\n')).toBe(true);
  });
});
