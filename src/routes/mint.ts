// Mint intake routes.
//
// POST /MintNFT       -- one token per request
// POST /MintNFTBatch  -- one token per item, issued in a single batch
//
// Both publish metadata, then issue through the authority as the configured
// service minter. Failures surface through the error handler with their
// MINT_*, STORAGE_* or AUTHORITY_* code.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { mintBatch, mintSingle } from '../mint/mint-service.js';
import type { MintContext } from '../mint/mint-service.js';

const mintRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const sensitive = {
    rateLimit: {
      max: fastify.config.rateLimit.sensitive,
      timeWindow: fastify.config.rateLimit.windowMs,
    },
  };

  function context(): MintContext {
    return {
      authority: fastify.authority,
      storage: fastify.storage,
      minter: fastify.config.authority.minter,
      defaultClaimable: fastify.config.authority.claimable,
      logger: fastify.log,
    };
  }

  fastify.post(
    '/MintNFT',
    {
      config: sensitive,
      schema: {
        description: 'Mint one token to ethAddress with metadata built from name, img and description',
        tags: ['Mint'],
      },
    },
    async (request, reply) => {
      request.log.info({ requestId: request.id }, 'NFT mint request received');
      const result = await mintSingle(context(), request.body);
      return reply.status(201).send(result);
    }
  );

  fastify.post(
    '/MintNFTBatch',
    {
      config: sensitive,
      schema: {
        description: 'Mint one token per item to ethAddress in a single batch issuance',
        tags: ['Mint'],
      },
    },
    async (request, reply) => {
      request.log.info({ requestId: request.id }, 'NFT batch mint request received');
      const result = await mintBatch(context(), request.body);
      return reply.status(201).send(result);
    }
  );

  done();
};

export const mintRoutesPlugin = fp(mintRoutes, {
  name: 'mint-routes',
  fastify: '5.x',
});
