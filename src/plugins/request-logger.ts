import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.addHook('onRequest', async (request) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        requestId: request.id,
        userAgent: request.headers['user-agent'],
      },
      'Incoming request'
    );
  });

  // Bodies are parsed after onRequest; mint payloads are logged in dev only
  if (isDev) {
    fastify.addHook('preHandler', async (request) => {
      if (request.body) {
        request.log.debug({ requestId: request.id, body: request.body }, 'Request body');
      }
    });
  }

  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
