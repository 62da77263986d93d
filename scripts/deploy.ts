// Deploy the token issuance authority and record its address.
//
// Usage:
//   CONFIG_PATH=config/config.json tsx scripts/deploy.ts
//
// Writes deployments/<env>.json with the authority address, deployer, and
// initial minter.

import { resolve } from 'node:path';

import pino from 'pino';
import type { Logger } from 'pino';

import { loadConfig } from '../src/config/index.js';
import type { Config } from '../src/config/index.js';
import { deployAuthority, writeDeploymentRecord } from '../src/deploy/deploy-authority.js';

async function deploy(config: Config, logger: Logger): Promise<void> {
  logger.info({ deployer: config.authority.admin }, 'Deploying authority with the account');

  const deployment = deployAuthority({
    deployer: config.authority.admin,
    minter: config.authority.minter,
    nonce: config.authority.deployNonce,
    baseUri: config.authority.baseUri,
    logger,
  });

  const recordPath = await writeDeploymentRecord(
    resolve(process.cwd(), 'deployments'),
    config.env,
    deployment
  );

  logger.info(
    { address: deployment.address, minter: deployment.minter, record: recordPath },
    'Authority deployed'
  );
}

function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (err) {
    // No logger without a config
    console.error('Failed to load configuration:', err);
    return process.exit(1);
  }
}

const config = loadConfigOrExit();
const logger = pino({
  level: config.logging.level,
  transport: config.logging.pretty
    ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } }
    : undefined,
});

deploy(config, logger)
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    logger.error({ err }, 'Deployment failed');
    process.exit(1);
  });
