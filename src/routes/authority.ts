// Authority read routes: deployment info, minter membership, and
// capability discovery.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { Address } from 'viem';
import { z } from 'zod';

interface MinterParams {
  address: Address;
}

interface SupportsParams {
  interfaceId: string;
}

const authorityRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/authority',
    {
      schema: {
        description: 'Deployment record and current state of the issuance authority',
        tags: ['Authority'],
        response: {
          200: z.object({
            address: z.string(),
            admin: z.string(),
            minters: z.array(z.string()),
            baseUri: z.string(),
            nextTokenId: z.string(),
            deployedAt: z.string(),
          }),
        },
      },
    },
    async (_request, reply) => {
      const { authority, deployment } = fastify;
      return reply.status(200).send({
        address: authority.address,
        admin: authority.admin,
        minters: authority.minters(),
        baseUri: authority.baseUri,
        nextTokenId: authority.nextTokenId.toString(),
        deployedAt: deployment.deployedAt,
      });
    }
  );

  fastify.get<{ Params: MinterParams }>(
    '/authority/minters/:address',
    {
      schema: {
        description: 'Whether an address holds MinterRole',
        tags: ['Authority'],
        params: z.object({
          address: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'Must be a 20-byte hex address'),
        }),
        response: { 200: z.object({ address: z.string(), isMinter: z.boolean() }) },
      },
    },
    async (request, reply) => {
      const { address } = request.params;
      return reply.status(200).send({ address, isMinter: fastify.authority.isMinter(address) });
    }
  );

  fastify.get<{ Params: SupportsParams }>(
    '/authority/supports/:interfaceId',
    {
      schema: {
        description: 'ERC-165 style capability check',
        tags: ['Authority'],
        params: z.object({
          interfaceId: z.string().regex(/^0x[0-9a-fA-F]{8}$/, 'Must be a 4-byte hex interface id'),
        }),
        response: { 200: z.object({ interfaceId: z.string(), supported: z.boolean() }) },
      },
    },
    async (request, reply) => {
      const { interfaceId } = request.params;
      return reply
        .status(200)
        .send({ interfaceId, supported: fastify.authority.supportsInterface(interfaceId) });
    }
  );

  done();
};

export const authorityRoutesPlugin = fp(authorityRoutes, {
  name: 'authority-routes',
  fastify: '5.x',
});
