export { loadFileConfig, parseSimpleYaml, DEFAULT_FILE_CONFIG } from './file-config.js';
export type { DalsFileConfig } from './file-config.js';
export { loadServiceConfig } from './service-config.js';
export type { ServiceConfig, LogLevel } from './service-config.js';
