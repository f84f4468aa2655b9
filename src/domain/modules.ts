/**
 * Registry of the subsystems DALS can report on.
 *
 * Each entry declares the counters its status record carries. A name
 * missing from the registry is unknown, not offline.
 */

export interface ModuleDefinition {
  readonly name: string;
  readonly description: string;
  readonly counters: readonly string[];
}

export type ModuleRegistry = ReadonlyMap<string, ModuleDefinition>;

export const DEFAULT_MODULES: readonly ModuleDefinition[] = [
  {
    name: 'caleon',
    description: 'Consciousness cycle orchestrator',
    counters: ['cycles_completed', 'vault_entries', 'harmonizer_pings'],
  },
  {
    name: 'certsig',
    description: 'Certificate signing and minting',
    counters: ['signatures_processed', 'certificates_minted'],
  },
  {
    name: 'prometheus',
    description: 'Reasoning microservice gateway',
    counters: ['reasoning_requests', 'vault_queries'],
  },
  {
    name: 'iss',
    description: 'Interplanetary Stardate Synchrometer',
    counters: ['log_entries', 'modules_loaded'],
  },
];

export function createModuleRegistry(
  modules: readonly ModuleDefinition[] = DEFAULT_MODULES,
): ModuleRegistry {
  return new Map(modules.map((m) => [m.name, m]));
}
