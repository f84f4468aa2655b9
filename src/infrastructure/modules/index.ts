export { InMemoryModuleStateSource } from './in-memory-module-source.js';
export type { ModuleReading, ModuleStateSource } from './in-memory-module-source.js';
