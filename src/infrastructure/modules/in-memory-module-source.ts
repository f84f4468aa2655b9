import type { ModuleCounters } from '../../domain/index.js';

/** Raw, un-normalized state of one subsystem. */
export interface ModuleReading {
  readonly active: boolean;
  readonly counters: ModuleCounters;
}

/**
 * Where module wiring comes from.
 *
 * Readings are raw: a source may report counters for an inactive module,
 * and the status normalizer is responsible for clamping them.
 */
export interface ModuleStateSource {
  read(moduleName: string): ModuleReading;
}

const UNWIRED: ModuleReading = { active: false, counters: {} };

/**
 * In-memory module state.
 *
 * Seeded from configuration at startup. Modules it has never heard of
 * read as unwired.
 */
export class InMemoryModuleStateSource implements ModuleStateSource {
  private readonly readings: Map<string, ModuleReading> = new Map();

  constructor(initial: Readonly<Record<string, ModuleReading>> = {}) {
    for (const [name, reading] of Object.entries(initial)) {
      this.readings.set(name, { active: reading.active, counters: { ...reading.counters } });
    }
  }

  read(moduleName: string): ModuleReading {
    return this.readings.get(moduleName) ?? UNWIRED;
  }

  setActive(moduleName: string, active: boolean): void {
    const current = this.read(moduleName);
    this.readings.set(moduleName, { active, counters: current.counters });
  }

  /** Replaces the module's raw counters. */
  setCounters(moduleName: string, counters: ModuleCounters): void {
    const current = this.read(moduleName);
    this.readings.set(moduleName, { active: current.active, counters: { ...counters } });
  }
}
