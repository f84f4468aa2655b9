import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import {
  createModuleRegistry,
  createStardateEncoder,
  createStatusNormalizer,
} from './domain/index.js';
import type { StardateEncoder, StatusNormalizer } from './domain/index.js';
import { InMemoryModuleStateSource, servicesPlugin } from './infrastructure/index.js';
import type { LogLevel, ModuleStateSource } from './infrastructure/index.js';
import {
  errorHandler,
  healthRoutes,
  stardateRoutes,
  moduleRoutes,
  dashboardRoutes,
} from './interfaces/http/index.js';

export interface BuildAppOptions {
  logLevel?: LogLevel;
  encoder?: StardateEncoder;
  normalizer?: StatusNormalizer;
  moduleSource?: ModuleStateSource;
  dashboardHtmlPath?: string;
}

/**
 * Assemble the Fastify app without listening.
 *
 * Order:
 * 1) Error handling
 * 2) Core services
 * 3) HTTP routes
 */
export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {

  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? 'info',
    },
  });

  await fastify.register(errorHandler);

  await fastify.register(servicesPlugin, {
    encoder: options.encoder ?? createStardateEncoder(),
    normalizer: options.normalizer ?? createStatusNormalizer(createModuleRegistry()),
    moduleSource: options.moduleSource ?? new InMemoryModuleStateSource(),
  });

  await fastify.register(healthRoutes);
  await fastify.register(stardateRoutes);
  await fastify.register(moduleRoutes);
  await fastify.register(dashboardRoutes, { htmlPath: options.dashboardHtmlPath });

  return fastify;
}
