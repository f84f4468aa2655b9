import { EpochUnderflowError, InvalidTimestampError } from './errors.js';

/** 2000-01-01T00:00:00Z — the canonical stardate epoch. */
export const Y2K_EPOCH_MS = Date.UTC(2000, 0, 1);

const MS_PER_DAY = 86_400_000;
const SCALE = 10_000; // four decimal places
const MS_PER_UNIT = MS_PER_DAY / SCALE; // 8640 ms = 0.0001 day

const ISO_DATETIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Rejects fields Date.parse would silently roll over, e.g. February 30th. */
function isCalendarValid(match: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map((part) => (part === undefined ? 0 : Number(part)));
  if (
    year === undefined || month === undefined || day === undefined ||
    hour === undefined || minute === undefined || second === undefined
  ) {
    return false;
  }

  return (
    month >= 1 && month <= 12 &&
    day >= 1 && day <= daysInMonth(year, month) &&
    hour <= 23 && minute <= 59 && second <= 59
  );
}

/** An absolute point in time: a `Date`, or an ISO-8601 string carrying its offset. */
export type Instant = Date | string;

export interface StardateReading {
  readonly stardate: number;
  readonly iso_timestamp: string; // ISO-8601, UTC
}

/**
 * Resolves an instant to epoch milliseconds.
 *
 * Strings must be ISO-8601 date-times with an explicit `Z` or `±hh:mm`
 * designator. A naive string is rejected instead of being read as local
 * or UTC time.
 */
export function toInstantMs(instant: Instant): number {
  if (instant instanceof Date) {
    const ms = instant.getTime();
    if (Number.isNaN(ms)) {
      throw new InvalidTimestampError('Invalid Date', 'date value is not a valid time');
    }
    return ms;
  }

  const text = instant.trim();
  const match = ISO_DATETIME_RE.exec(text);
  if (match === null) {
    throw new InvalidTimestampError(instant, 'not an ISO-8601 date-time');
  }
  const zone = match[7];
  if (zone === undefined) {
    throw new InvalidTimestampError(instant, 'missing timezone designator');
  }

  if (!isCalendarValid(match)) {
    throw new InvalidTimestampError(instant, 'date-time out of calendar range');
  }

  // Date.parse only guarantees the `Z` / `±hh:mm` forms
  const body = text.slice(0, text.length - zone.length).toUpperCase();
  const offset = zone.toUpperCase() === 'Z' ? 'Z' : `${zone.slice(0, 3)}:${zone.slice(-2)}`;

  const ms = Date.parse(body + offset);
  if (Number.isNaN(ms)) {
    throw new InvalidTimestampError(instant, 'unparseable date-time');
  }
  return ms;
}

/**
 * Rounds elapsed milliseconds to days at four decimals, half-to-even.
 *
 * Works on whole 0.0001-day units so the only float operation is the
 * final division.
 */
export function roundElapsedDays(elapsedMs: number): number {
  const units = Math.floor(elapsedMs / MS_PER_UNIT);
  const twiceRemainder = (elapsedMs - units * MS_PER_UNIT) * 2;

  const roundUp =
    twiceRemainder > MS_PER_UNIT ||
    (twiceRemainder === MS_PER_UNIT && units % 2 !== 0);

  return (roundUp ? units + 1 : units) / SCALE;
}

/**
 * Encodes an instant as days elapsed since `epochMs`.
 *
 * Throws `InvalidTimestampError` for naive or malformed input and
 * `EpochUnderflowError` for instants before the epoch.
 */
export function encodeStardate(
  instant: Instant,
  epochMs: number = Y2K_EPOCH_MS,
): StardateReading {
  const ms = toInstantMs(instant);
  const iso = new Date(ms).toISOString();

  if (ms < epochMs) {
    throw new EpochUnderflowError(iso, new Date(epochMs).toISOString());
  }

  return {
    stardate: roundElapsedDays(ms - epochMs),
    iso_timestamp: iso,
  };
}

/** Renders a stardate with exactly four decimals, e.g. `"9424.5000"`. */
export function formatStardate(stardate: number): string {
  return stardate.toFixed(4);
}

export interface StardateEncoderOptions {
  /** Reference instant. Defaults to the Y2K epoch. */
  epoch?: Instant;
  /** Wall clock in epoch ms. Defaults to `Date.now`. */
  nowFn?: () => number;
}

export interface StardateEncoder {
  readonly epochIso: string;
  encode(instant: Instant): StardateReading;
  now(): StardateReading;
}

/**
 * Builds an encoder bound to a fixed epoch and clock.
 *
 * The epoch is resolved once; the encoder holds no other state.
 */
export function createStardateEncoder(
  options: StardateEncoderOptions = {},
): StardateEncoder {
  const epochMs = options.epoch === undefined ? Y2K_EPOCH_MS : toInstantMs(options.epoch);
  const nowFn = options.nowFn ?? Date.now;

  return {
    epochIso: new Date(epochMs).toISOString(),

    encode(instant: Instant): StardateReading {
      return encodeStardate(instant, epochMs);
    },

    now(): StardateReading {
      return encodeStardate(new Date(nowFn()), epochMs);
    },
  };
}
