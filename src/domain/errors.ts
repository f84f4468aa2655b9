/**
 * Domain error taxonomy.
 *
 * Every failure raised by the stardate encoder or the status normalizer
 * is a local validation failure: synchronous, isolated to the call,
 * never retryable. The HTTP layer maps `code` to a status.
 */

export type DalsErrorCode =
  | 'INVALID_TIMESTAMP'
  | 'EPOCH_UNDERFLOW'
  | 'UNKNOWN_MODULE';

export abstract class DalsError extends Error {
  abstract readonly code: DalsErrorCode;
}

/** Malformed, unparseable or timezone-less input instant. */
export class InvalidTimestampError extends DalsError {
  readonly code = 'INVALID_TIMESTAMP';

  constructor(readonly input: string, reason: string) {
    super(`Invalid timestamp "${input}": ${reason}`);
    this.name = 'InvalidTimestampError';
  }
}

/** Input instant precedes the stardate epoch. */
export class EpochUnderflowError extends DalsError {
  readonly code = 'EPOCH_UNDERFLOW';

  constructor(readonly iso: string, readonly epochIso: string) {
    super(`Timestamp ${iso} precedes the stardate epoch ${epochIso}`);
    this.name = 'EpochUnderflowError';
  }
}

/** Status requested for a subsystem name outside the registry. */
export class UnknownModuleError extends DalsError {
  readonly code = 'UNKNOWN_MODULE';

  constructor(readonly moduleName: string) {
    super(`Unknown module: "${moduleName}"`);
    this.name = 'UnknownModuleError';
  }
}
