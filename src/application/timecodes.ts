import { createHash } from 'node:crypto';
import type { Instant, StardateEncoder } from '../domain/index.js';

const UNIX_EPOCH_JULIAN_DATE = 2_440_587.5;

export interface Timecodes {
  timestamp_iso: string;
  timestamp_epoch: number;
  timestamp_julian: number;
  stardate_iss: number;
  anchor_hash: string;
}

/**
 * Builds the ISS time bundle for one instant.
 *
 * Every field derives from the same encoder reading, so they always
 * describe the same moment.
 */
export function currentTimecodes(
  encoder: StardateEncoder,
  instant?: Instant,
): Timecodes {
  const reading = instant === undefined ? encoder.now() : encoder.encode(instant);
  const unixSeconds = new Date(reading.iso_timestamp).getTime() / 1000;

  const anchor_hash = createHash('sha256')
    .update(`ISS-${reading.iso_timestamp}-${reading.stardate}`)
    .digest('hex')
    .slice(0, 16);

  return {
    timestamp_iso: reading.iso_timestamp,
    timestamp_epoch: unixSeconds,
    timestamp_julian: parseFloat((unixSeconds / 86_400 + UNIX_EPOCH_JULIAN_DATE).toFixed(6)),
    stardate_iss: reading.stardate,
    anchor_hash,
  };
}
