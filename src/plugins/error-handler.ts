import type { FastifyPluginCallback, FastifyError, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { Sentry } from '../instrument.js';

interface ErrorHandlerOptions {
  isDev: boolean;
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    statusCode: number;
    stack?: string;
  };
  requestId: string;
  timestamp: string;
}

const GENERIC_MESSAGE = 'An internal error occurred';

/**
 * Production message rules, first match wins. MINT_*, AUTHORITY_* and
 * CONFIG_* errors describe the caller's request or the deployment and are
 * returned as thrown.
 */
const SANITIZE_RULES: ReadonlyArray<{
  matches: (code: string, statusCode: number) => boolean;
  message: string | null;
}> = [
  { matches: (_code, statusCode) => statusCode === 429, message: null },
  // Backend error text can carry hostnames and paths
  { matches: (code) => code.startsWith('STORAGE_'), message: 'Metadata storage is unavailable' },
  { matches: (code) => code === 'INTERNAL_ERROR' || code.startsWith('SERVER_'), message: GENERIC_MESSAGE },
  {
    matches: (code, statusCode) => statusCode >= 500 && !code.startsWith('CONFIG_'),
    message: GENERIC_MESSAGE,
  },
];

function sanitizeMessage(message: string, code: string, statusCode: number): string {
  const rule = SANITIZE_RULES.find((r) => r.matches(code, statusCode));
  return rule?.message ?? message;
}

function buildResponse(
  request: FastifyRequest,
  error: ErrorResponse['error']
): ErrorResponse {
  return { error, requestId: request.id, timestamp: new Date().toISOString() };
}

const errorHandler: FastifyPluginCallback<ErrorHandlerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    // Schema failures on params or body
    const code = error.validation ? 'VALIDATION_ERROR' : (error.code ?? 'INTERNAL_ERROR');

    request.log[statusCode >= 500 ? 'error' : 'warn']({ err: error, code, statusCode }, 'Request error');

    if (statusCode >= 500) {
      Sentry.captureException(error, {
        extra: { requestId: request.id, url: request.url, method: request.method },
      });
    }

    reply.status(statusCode).send(
      buildResponse(request, {
        code,
        message: isDev ? error.message : sanitizeMessage(error.message, code, statusCode),
        statusCode,
        ...(isDev && error.stack && { stack: error.stack }),
      })
    );
  });

  fastify.setNotFoundHandler((request, reply) => {
    request.log.warn({ method: request.method, url: request.url }, 'Route not found');

    reply.status(404).send(
      buildResponse(request, {
        code: 'NOT_FOUND',
        message: `Route ${request.method}:${request.url} not found`,
        statusCode: 404,
      })
    );
  });

  done();
};

export const errorHandlerPlugin = fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
