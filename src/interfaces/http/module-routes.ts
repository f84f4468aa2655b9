import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  getModuleStatus,
  listModuleStatuses,
  moduleParamsSchema,
  summarizeSystem,
} from '../../application/index.js';

/**
 * Module status routes.
 *
 * GET /api/v1/modules                 — every registered module + summary
 * GET /api/v1/modules/:module/status  — one module; unknown names → 404
 *
 * Both go through the status normalizer, so inactive modules never
 * report a non-zero counter.
 */
async function moduleRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/modules',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const modules = listModuleStatuses(fastify.statusNormalizer, fastify.moduleSource);
      return reply.status(200).send({ modules, summary: summarizeSystem(modules) });
    },
  );

  fastify.get(
    '/api/v1/modules/:module/status',
    async (
      request: FastifyRequest<{ Params: { module: string } }>,
      reply: FastifyReply,
    ) => {
      const parsed = moduleParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const record = getModuleStatus(
        fastify.statusNormalizer,
        fastify.moduleSource,
        parsed.data.module,
      );

      return reply.status(200).send(record);
    },
  );
}

export default fp(moduleRoutes, {
  name: 'module-routes',
  dependencies: ['services'],
  fastify: '5.x',
});
