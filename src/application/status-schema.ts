import { z } from 'zod';

/**
 * Query string for GET /api/v1/stardate and GET /api/v1/iss/now.
 *
 * `at` is checked for shape only; timezone and epoch rules belong to the
 * encoder so the HTTP layer reports them with the domain error codes.
 */
export const stardateQuerySchema = z.object({
  at: z.string().min(1).max(64).optional(),
});

export type StardateQuery = z.infer<typeof stardateQuerySchema>;

/** Route params for GET /api/v1/modules/:module/status. */
export const moduleParamsSchema = z.object({
  module: z.string().min(1).max(64).regex(/^[a-z0-9_-]+$/i, 'Must be a module identifier'),
});

export type ModuleParams = z.infer<typeof moduleParamsSchema>;

/** Raw counters as supplied by a module state source. */
export const countersSchema = z.record(z.string(), z.number().finite());
