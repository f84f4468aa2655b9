import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Zod schema for the process environment.
 *
 * Every key is optional; defaults match a local developer setup.
 */
export const serviceEnvSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8003),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  STARDATE_EPOCH: z.string().min(1).default('2000-01-01T00:00:00Z'),
  MODULES_CONFIG: z.string().min(1).optional(),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServiceConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  stardateEpoch: string;
  modulesConfigPath: string | undefined;
}

/**
 * Reads and validates service settings from the environment.
 *
 * Throws a ZodError listing every invalid variable.
 */
export function loadServiceConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServiceConfig {
  const parsed = serviceEnvSchema.parse(env);

  return {
    host: parsed.HOST,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    stardateEpoch: parsed.STARDATE_EPOCH,
    modulesConfigPath: parsed.MODULES_CONFIG,
  };
}
