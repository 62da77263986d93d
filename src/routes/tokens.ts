// Token read routes: metadata pointers, balances, and the id counter.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { Address } from 'viem';
import { z } from 'zod';

const TokenIdParam = z.string().regex(/^\d+$/, 'Token id must be a decimal integer');
const AddressParam = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'Must be a 20-byte hex address');

interface TokenParams {
  id: string;
}

interface BalanceParams {
  id: string;
  owner: Address;
}

const tokenRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/tokens/next-id',
    {
      schema: {
        description: 'Token id the next issuance will allocate',
        tags: ['Tokens'],
        response: { 200: z.object({ nextTokenId: z.string() }) },
      },
    },
    async (_request, reply) => {
      return reply.status(200).send({ nextTokenId: fastify.authority.nextTokenId.toString() });
    }
  );

  fastify.get<{ Params: TokenParams }>(
    '/tokens/:id',
    {
      schema: {
        description: 'Resolve the metadata pointer of a token',
        tags: ['Tokens'],
        params: z.object({ id: TokenIdParam }),
        response: { 200: z.object({ id: z.string(), uri: z.string() }) },
      },
    },
    async (request, reply) => {
      const id = BigInt(request.params.id);
      return reply.status(200).send({ id: id.toString(), uri: fastify.authority.uri(id) });
    }
  );

  fastify.get<{ Params: BalanceParams }>(
    '/tokens/:id/balance/:owner',
    {
      schema: {
        description: 'Balance of a token held by an owner',
        tags: ['Tokens'],
        params: z.object({ id: TokenIdParam, owner: AddressParam }),
        response: {
          200: z.object({ id: z.string(), owner: z.string(), balance: z.string() }),
        },
      },
    },
    async (request, reply) => {
      const id = BigInt(request.params.id);
      const { owner } = request.params;
      const balance = fastify.authority.balanceOf(owner, id);
      return reply.status(200).send({ id: id.toString(), owner, balance: balance.toString() });
    }
  );

  done();
};

export const tokenRoutesPlugin = fp(tokenRoutes, {
  name: 'token-routes',
  fastify: '5.x',
});
