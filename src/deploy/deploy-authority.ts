// Authority deployment.
//
// Derives the authority address from (deployer, nonce) the way a CREATE
// deployment does, constructs the authority with the deployer as its admin,
// and produces a record that can be written next to the other deployments.

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { getAddress, getContractAddress } from 'viem';
import type { Address } from 'viem';

import { TokenAuthority } from '../authority/token-authority.js';
import type { AuthorityLogger } from '../authority/types.js';

export interface DeployOptions {
  /** Deploying principal; becomes the authority's admin */
  deployer: Address;
  /** Initial MinterRole holder */
  minter: Address;
  /** Deployer nonce at deployment time */
  nonce?: number;
  baseUri?: string;
  logger?: AuthorityLogger;
}

export interface DeploymentRecord {
  address: Address;
  deployer: Address;
  minter: Address;
  nonce: number;
  baseUri: string;
  deployedAt: string;
}

export interface Deployment extends DeploymentRecord {
  authority: TokenAuthority;
}

export function deployAuthority(options: DeployOptions): Deployment {
  const deployer = getAddress(options.deployer);
  const minter = getAddress(options.minter);
  const nonce = options.nonce ?? 0;
  const baseUri = options.baseUri ?? '';

  const address = getContractAddress({ from: deployer, nonce: BigInt(nonce) });
  const authority = new TokenAuthority(deployer, minter, {
    address,
    baseUri,
    logger: options.logger,
  });

  return {
    address,
    deployer,
    minter,
    nonce,
    baseUri,
    deployedAt: new Date().toISOString(),
    authority,
  };
}

/**
 * Write `<dir>/<name>.json` with the serialisable part of a deployment.
 * @returns path of the written file
 */
export async function writeDeploymentRecord(
  dir: string,
  name: string,
  deployment: Deployment
): Promise<string> {
  const record: DeploymentRecord = {
    address: deployment.address,
    deployer: deployment.deployer,
    minter: deployment.minter,
    nonce: deployment.nonce,
    baseUri: deployment.baseUri,
    deployedAt: deployment.deployedAt,
  };

  await mkdir(dir, { recursive: true });
  const filePath = join(dir, `${name}.json`);
  await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`);
  return filePath;
}
