import { UnknownModuleError } from './errors.js';
import { createModuleRegistry } from './modules.js';
import type { ModuleRegistry } from './modules.js';

export type ModuleCounters = Readonly<Record<string, number>>;

export type ModuleStatus = 'offline' | 'online';

/**
 * Status of one subsystem, built fresh per request.
 *
 * Invariant: when `active` is false every counter is 0.
 */
export interface ModuleStatusRecord {
  readonly module: string;
  readonly active: boolean;
  readonly status: ModuleStatus;
  readonly counters: ModuleCounters;
}

export interface StatusNormalizer {
  readonly registry: ModuleRegistry;
  normalize(moduleName: string, active: boolean, counters?: ModuleCounters): ModuleStatusRecord;
}

/**
 * Shapes a raw module reading into a status record.
 *
 * Inactive modules report zero for every supplied and every declared
 * counter, whatever was passed in. Active modules pass their counters
 * through untouched.
 */
export function normalizeStatus(
  registry: ModuleRegistry,
  moduleName: string,
  active: boolean,
  counters: ModuleCounters = {},
): ModuleStatusRecord {
  const definition = registry.get(moduleName);
  if (definition === undefined) {
    throw new UnknownModuleError(moduleName);
  }

  if (active) {
    return {
      module: definition.name,
      active: true,
      status: 'online',
      counters: { ...counters },
    };
  }

  const zeroed: Record<string, number> = {};
  for (const key of definition.counters) zeroed[key] = 0;
  for (const key of Object.keys(counters)) zeroed[key] = 0;

  return {
    module: definition.name,
    active: false,
    status: 'offline',
    counters: zeroed,
  };
}

export function createStatusNormalizer(
  registry: ModuleRegistry = createModuleRegistry(),
): StatusNormalizer {
  return {
    registry,
    normalize(moduleName, active, counters) {
      return normalizeStatus(registry, moduleName, active, counters);
    },
  };
}
