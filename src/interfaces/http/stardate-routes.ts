import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { currentTimecodes, stardateQuerySchema } from '../../application/index.js';
import { formatStardate } from '../../domain/index.js';

/**
 * Time routes.
 *
 * GET /api/v1/stardate  — canonical stardate for now, or for `?at=<ISO-8601>`
 * GET /api/v1/iss/now   — full ISS timecode bundle, same `at` override
 *
 * Naive or malformed `at` values surface as INVALID_TIMESTAMP (400),
 * pre-epoch values as EPOCH_UNDERFLOW (422) via the error handler.
 */
async function stardateRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/stardate',
    async (
      request: FastifyRequest<{ Querystring: { at?: string } }>,
      reply: FastifyReply,
    ) => {
      const parsed = stardateQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { at } = parsed.data;
      const reading = at === undefined ? fastify.stardate.now() : fastify.stardate.encode(at);

      return reply.status(200).send({
        ...reading,
        stardate_display: formatStardate(reading.stardate),
        epoch: fastify.stardate.epochIso,
      });
    },
  );

  fastify.get(
    '/api/v1/iss/now',
    async (
      request: FastifyRequest<{ Querystring: { at?: string } }>,
      reply: FastifyReply,
    ) => {
      const parsed = stardateQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      return reply.status(200).send(currentTimecodes(fastify.stardate, parsed.data.at));
    },
  );
}

export default fp(stardateRoutes, {
  name: 'stardate-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
