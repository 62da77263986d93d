// GET /metadata/:cid route -- serves stored token metadata documents.
//
// Target of the pointers the filesystem backend records on issued tokens.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

interface MetadataParams {
  cid: string;
}

const metadataRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Params: MetadataParams }>(
    '/metadata/:cid',
    {
      schema: {
        description: 'Token metadata document by content identifier',
        tags: ['Tokens'],
        params: z.object({
          cid: z.string().min(1).describe('Content identifier (SHA-256 hash or IPFS CID)'),
        }),
      },
    },
    async (request, reply) => {
      const { cid } = request.params;

      let data: Buffer | null;
      try {
        data = await fastify.storage.get(cid);
      } catch (error) {
        fastify.log.error(
          { err: error instanceof Error ? error.message : 'Unknown error', cid },
          'Metadata retrieval failed'
        );
        return reply.status(500).send({
          error: 'Internal Server Error',
          message: 'Failed to retrieve metadata',
        });
      }

      if (!data) {
        return reply.status(404).send({
          error: 'Not Found',
          message: 'Metadata not found',
        });
      }

      return reply
        .status(200)
        .header('Content-Type', 'application/json; charset=utf-8')
        .send(data);
    }
  );

  done();
};

export const metadataRoutesPlugin = fp(metadataRoutes, {
  name: 'metadata-routes',
  fastify: '5.x',
});
