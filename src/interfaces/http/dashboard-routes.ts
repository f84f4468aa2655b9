import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

export interface DashboardRoutesOptions {
  /** Defaults to public/dashboard.html under the working directory. */
  htmlPath?: string;
}

/**
 * GET / — static DALS dashboard page.
 *
 * Read per request so edits to the page show up without a restart.
 */
async function dashboardRoutes(
  fastify: FastifyInstance,
  opts: DashboardRoutesOptions,
): Promise<void> {
  const htmlPath = opts.htmlPath ?? resolve(process.cwd(), 'public', 'dashboard.html');

  fastify.get('/', (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const html = readFileSync(htmlPath, 'utf-8');
      return reply.type('text/html').send(html);
    } catch (err: unknown) {
      fastify.log.warn({ err, htmlPath }, 'Dashboard page not found');
      return reply.status(404).send({ error: 'NOT_FOUND', message: 'Dashboard not found' });
    }
  });
}

export default fp(dashboardRoutes, {
  name: 'dashboard-routes',
  fastify: '5.x',
});
