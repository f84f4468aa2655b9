import type { ModuleStatusRecord, StatusNormalizer } from '../domain/index.js';
import type { ModuleStateSource } from '../infrastructure/modules/index.js';

export type SystemHealth = 'optimal' | 'degraded' | 'offline';

export interface SystemSummary {
  active_modules: number;
  total_modules: number;
  system_health: SystemHealth;
}

/**
 * Use case: status of a single module.
 *
 * The source supplies the raw reading; the normalizer is always the last
 * step, so an unknown name fails here even if the source has data for it.
 */
export function getModuleStatus(
  normalizer: StatusNormalizer,
  source: ModuleStateSource,
  moduleName: string,
): ModuleStatusRecord {
  const reading = source.read(moduleName);
  return normalizer.normalize(moduleName, reading.active, reading.counters);
}

/** Use case: status of every registered module, in registry order. */
export function listModuleStatuses(
  normalizer: StatusNormalizer,
  source: ModuleStateSource,
): ModuleStatusRecord[] {
  return [...normalizer.registry.keys()].map((name) =>
    getModuleStatus(normalizer, source, name),
  );
}

export function summarizeSystem(records: readonly ModuleStatusRecord[]): SystemSummary {
  const active_modules = records.filter((r) => r.active).length;

  let system_health: SystemHealth = 'offline';
  if (active_modules >= 2) system_health = 'optimal';
  else if (active_modules === 1) system_health = 'degraded';

  return {
    active_modules,
    total_modules: records.length,
    system_health,
  };
}
