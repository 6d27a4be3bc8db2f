import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { AppError } from '../errors.js';

/**
 * Request id echo, the tenant slot the tenant hook fills, and the mapping of
 * thrown errors to `{ error, message, code, details? }` replies. Registered
 * through fastify-plugin so it applies to every route of the instance.
 */
const requestContextImpl: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('tenant', null);

  // Echo X-Request-ID
  fastify.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      }
      reply.code(error.statusCode).send(error.toJSON());
      return;
    }

    // Fastify's own client errors: malformed JSON, unsupported media type, oversized body
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      reply.code(statusCode).send({ error: error.name, message: error.message, code: error.code });
      return;
    }

    request.log.error({ err: error }, 'Unhandled error');
    reply.code(500).send({
      error: 'InternalServerError',
      message: 'Internal server error',
      code: 'INTERNAL_ERROR',
    });
  });
};

export const requestContext = fp(requestContextImpl, {
  name: 'request-context',
});
