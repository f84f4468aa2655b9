export { currentTimecodes } from './timecodes.js';
export type { Timecodes } from './timecodes.js';
export { getModuleStatus, listModuleStatuses, summarizeSystem } from './module-status.js';
export type { SystemHealth, SystemSummary } from './module-status.js';
export { stardateQuerySchema, moduleParamsSchema, countersSchema } from './status-schema.js';
export type { StardateQuery, ModuleParams } from './status-schema.js';
export { buildStatusSnapshot, filterSnapshot } from './telemetry.js';
export type { StatusSnapshot } from './telemetry.js';
