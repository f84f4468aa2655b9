export {
  DalsError,
  InvalidTimestampError,
  EpochUnderflowError,
  UnknownModuleError,
} from './errors.js';
export type { DalsErrorCode } from './errors.js';
export {
  Y2K_EPOCH_MS,
  toInstantMs,
  roundElapsedDays,
  encodeStardate,
  formatStardate,
  createStardateEncoder,
} from './stardate.js';
export type {
  Instant,
  StardateReading,
  StardateEncoder,
  StardateEncoderOptions,
} from './stardate.js';
export { DEFAULT_MODULES, createModuleRegistry } from './modules.js';
export type { ModuleDefinition, ModuleRegistry } from './modules.js';
export { normalizeStatus, createStatusNormalizer } from './module-status.js';
export type {
  ModuleCounters,
  ModuleStatus,
  ModuleStatusRecord,
  StatusNormalizer,
} from './module-status.js';
