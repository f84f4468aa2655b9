import { formatStardate } from '../domain/index.js';
import type { ModuleStatusRecord, StardateEncoder, StatusNormalizer } from '../domain/index.js';
import type { ModuleStateSource } from '../infrastructure/modules/index.js';
import { listModuleStatuses, summarizeSystem } from './module-status.js';
import type { SystemSummary } from './module-status.js';

export interface StatusSnapshot {
  stardate: number;
  /** Four-decimal text form, e.g. `"0.7500"`. */
  stardate_display: string;
  iso_timestamp: string;
  modules: ModuleStatusRecord[];
  summary: SystemSummary;
}

/**
 * Use case: one consistent view of time and module state, pushed to
 * telemetry subscribers.
 */
export function buildStatusSnapshot(
  encoder: StardateEncoder,
  normalizer: StatusNormalizer,
  source: ModuleStateSource,
): StatusSnapshot {
  const reading = encoder.now();
  const modules = listModuleStatuses(normalizer, source);

  return {
    stardate: reading.stardate,
    stardate_display: formatStardate(reading.stardate),
    iso_timestamp: reading.iso_timestamp,
    modules,
    summary: summarizeSystem(modules),
  };
}

/**
 * Narrows a snapshot to the modules a client subscribed to.
 *
 * An empty subscription set, or one containing `all`, means everything.
 * The summary always describes the whole system.
 */
export function filterSnapshot(
  snapshot: StatusSnapshot,
  subscriptions: ReadonlySet<string>,
): StatusSnapshot {
  if (subscriptions.size === 0 || subscriptions.has('all')) return snapshot;

  return {
    ...snapshot,
    modules: snapshot.modules.filter((m) => subscriptions.has(m.module)),
  };
}
