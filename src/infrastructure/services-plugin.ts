import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { StardateEncoder, StatusNormalizer } from '../domain/index.js';
import type { ModuleStateSource } from './modules/index.js';

export interface ServicesPluginOptions {
  encoder: StardateEncoder;
  normalizer: StatusNormalizer;
  moduleSource: ModuleStateSource;
}

/**
 * Fastify plugin that exposes the core services to routes.
 *
 * Decorates `fastify.stardate`, `fastify.statusNormalizer` and
 * `fastify.moduleSource`. All three are stateless or read-only from the
 * routes' point of view, so one instance serves every request.
 */
async function servicesPlugin(
  fastify: FastifyInstance,
  opts: ServicesPluginOptions,
): Promise<void> {
  fastify.decorate('stardate', opts.encoder);
  fastify.decorate('statusNormalizer', opts.normalizer);
  fastify.decorate('moduleSource', opts.moduleSource);

  fastify.log.debug(
    { epoch: opts.encoder.epochIso, modules: [...opts.normalizer.registry.keys()] },
    'Core services registered',
  );
}

export default fp(servicesPlugin, {
  name: 'services',
  fastify: '5.x',
});

/** Extend Fastify's type system so the services are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    stardate: StardateEncoder;
    statusNormalizer: StatusNormalizer;
    moduleSource: ModuleStateSource;
  }
}
