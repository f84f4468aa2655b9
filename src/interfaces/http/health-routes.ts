import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listModuleStatuses, summarizeSystem } from '../../application/index.js';

/**
 * Health routes.
 *
 * GET /health         — liveness for the dashboard container
 * GET /api/v1/health  — liveness plus current stardate and module summary
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ status: 'healthy', service: 'dals-dashboard' });
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const reading = fastify.stardate.now();
      const modules = listModuleStatuses(fastify.statusNormalizer, fastify.moduleSource);

      return reply.status(200).send({
        status: 'healthy',
        service: 'dals',
        stardate: reading.stardate,
        iso_timestamp: reading.iso_timestamp,
        ...summarizeSystem(modules),
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
