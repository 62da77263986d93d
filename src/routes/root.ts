// GET / route -- API banner.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

const rootRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get(
    '/',
    {
      schema: {
        description: 'API banner',
        tags: ['Health'],
        response: {
          200: z.object({ message: z.string() }),
        },
      },
    },
    async (_request, reply) => {
      return reply.status(200).send({ message: 'Token Mint API Version 1' });
    }
  );

  done();
};

export const rootRoutesPlugin = fp(rootRoutes, {
  name: 'root-routes',
  fastify: '5.x',
});
