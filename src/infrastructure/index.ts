export { default as servicesPlugin } from './services-plugin.js';
export type { ServicesPluginOptions } from './services-plugin.js';
export { InMemoryModuleStateSource } from './modules/index.js';
export type { ModuleReading, ModuleStateSource } from './modules/index.js';
export { loadFileConfig, loadServiceConfig, parseSimpleYaml, DEFAULT_FILE_CONFIG } from './config/index.js';
export type { DalsFileConfig, ServiceConfig, LogLevel } from './config/index.js';
