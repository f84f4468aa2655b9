import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { DalsError } from '../../domain/index.js';
import type { DalsErrorCode } from '../../domain/index.js';

const STATUS_BY_CODE: Record<DalsErrorCode, number> = {
  INVALID_TIMESTAMP: 400,
  EPOCH_UNDERFLOW: 422,
  UNKNOWN_MODULE: 404,
};

/**
 * Single translation point from thrown errors to HTTP responses.
 *
 * Domain errors → 4xx with their code; Fastify client errors keep their
 * status; anything else is logged and reported as 500.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof DalsError) {
      request.log.debug({ code: error.code }, error.message);
      return reply
        .status(STATUS_BY_CODE[error.code])
        .send({ error: error.code, message: error.message });
    }

    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      return reply
        .status(error.statusCode)
        .send({ error: error.code, message: error.message });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(500).send({ error: 'INTERNAL', message: 'Internal server error' });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send({ error: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
