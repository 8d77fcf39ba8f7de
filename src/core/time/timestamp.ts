/**
 * Offset-Aware Timestamps
 *
 * A JavaScript Date is a bare instant: it cannot tell a timestamp written as
 * "2024-03-01T09:00:00+08:00" apart from one written as "2024-03-01T09:00:00"
 * with no offset at all. The scheduler needs that distinction, because naive
 * timestamps are a data-quality defect that must be detected and repaired
 * rather than silently reinterpreted.
 *
 * A Timestamp therefore keeps the civil wall-clock reading and the offset
 * separately:
 *
 * - `wallClockMs`: the year/month/day/hour/minute/second/millisecond fields,
 *   encoded as milliseconds since the epoch *as if they were UTC*
 * - `offsetMinutes`: the civil-time offset east of UTC, or `null` when the
 *   timestamp is naive
 *
 * The absolute instant of a zoned timestamp is `wallClockMs - offsetMinutes`.
 * Offsets are fixed (no DST rules), so adding whole days is plain arithmetic
 * on the wall clock.
 */

import { timestampError } from '../errors';

const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

/** Largest offset accepted, in minutes (±18:00, the ISO-8601 practical limit). */
const MAX_OFFSET_MINUTES = 18 * 60;

/**
 * A civil date-time with an optional explicit offset.
 */
export interface Timestamp {
  /** Wall-clock fields encoded as milliseconds since the epoch, as if UTC */
  readonly wallClockMs: number;
  /** Offset east of UTC in minutes, or null for a naive timestamp */
  readonly offsetMinutes: number | null;
}

/**
 * A Timestamp that carries an explicit offset and so denotes a single instant.
 */
export interface ZonedTimestamp extends Timestamp {
  readonly offsetMinutes: number;
}

// YYYY-MM-DD, optionally followed by a time and then optionally an offset
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Returns true when the timestamp carries an explicit offset.
 */
export function isZoned(timestamp: Timestamp): timestamp is ZonedTimestamp {
  return timestamp.offsetMinutes !== null;
}

/**
 * Parses an offset designator into minutes east of UTC.
 *
 * Accepts `Z`, `UTC`, `±HH:MM` and `±HHMM`.
 *
 * @throws AppError (INVALID_TIMESTAMP) for anything else
 */
export function parseOffset(text: string): number {
  const trimmed = text.trim();
  if (trimmed.toUpperCase() === 'Z' || trimmed.toUpperCase() === 'UTC') {
    return 0;
  }

  const match = OFFSET_PATTERN.exec(trimmed);
  if (!match) {
    throw timestampError(text, 'expected Z, UTC, ±HH:MM or ±HHMM');
  }

  const [, sign, hours, minutes] = match;
  if (Number(minutes) > 59) {
    throw timestampError(text, 'offset minutes out of range');
  }

  const total = Number(hours) * 60 + Number(minutes);
  if (total > MAX_OFFSET_MINUTES) {
    throw timestampError(text, 'offset exceeds ±18:00');
  }
  return sign === '-' ? -total : total;
}

/**
 * Formats an offset in minutes as `±HH:MM`. Zero is written `+00:00`.
 */
export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60), 2)}:${pad(abs % 60, 2)}`;
}

/**
 * Parses ISO-8601 style text into a Timestamp.
 *
 * Accepted shapes: `YYYY-MM-DD`, `YYYY-MM-DDTHH:MM`, `YYYY-MM-DDTHH:MM:SS`,
 * with optional fractional seconds (truncated to milliseconds), a space in
 * place of `T`, and an optional `Z`/`±HH:MM`/`±HHMM` suffix. Text without a
 * suffix yields a naive timestamp.
 *
 * @throws AppError (INVALID_TIMESTAMP) when the text is not a valid date-time
 *
 * @example
 * ```typescript
 * parseTimestamp('2024-03-01T09:00:00+08:00');
 * // { wallClockMs: Date.UTC(2024, 2, 1, 9), offsetMinutes: 480 }
 *
 * parseTimestamp('2024-03-01 09:00:00');
 * // { wallClockMs: Date.UTC(2024, 2, 1, 9), offsetMinutes: null }
 * ```
 */
export function parseTimestamp(text: string): Timestamp {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    throw timestampError(text, 'expected YYYY-MM-DD[THH:MM[:SS[.fff]]][offset]');
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', offset] = match;
  const fields = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    millisecond: Number(fraction.padEnd(3, '0').slice(0, 3)),
  };

  if (fields.hour > 23 || fields.minute > 59 || fields.second > 59) {
    throw timestampError(text, 'time of day out of range');
  }

  const wallClockMs = Date.UTC(
    fields.year,
    fields.month - 1,
    fields.day,
    fields.hour,
    fields.minute,
    fields.second,
    fields.millisecond
  );

  // Date.UTC rolls over out-of-range days (Feb 30 -> Mar 1); reject those
  const check = new Date(wallClockMs);
  if (
    check.getUTCFullYear() !== fields.year ||
    check.getUTCMonth() !== fields.month - 1 ||
    check.getUTCDate() !== fields.day
  ) {
    throw timestampError(text, 'calendar date out of range');
  }

  return {
    wallClockMs,
    offsetMinutes: offset === undefined ? null : parseOffset(offset),
  };
}

/**
 * Formats a Timestamp as `YYYY-MM-DDTHH:MM:SS.sss`, followed by `±HH:MM`
 * when the timestamp is zoned. Naive timestamps are written without a suffix,
 * so parse/format round-trips preserve naivety.
 */
export function formatTimestamp(timestamp: Timestamp): string {
  const d = new Date(timestamp.wallClockMs);
  const civil =
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1, 2)}-${pad(d.getUTCDate(), 2)}` +
    `T${pad(d.getUTCHours(), 2)}:${pad(d.getUTCMinutes(), 2)}:${pad(d.getUTCSeconds(), 2)}` +
    `.${pad(d.getUTCMilliseconds(), 3)}`;

  return timestamp.offsetMinutes === null ? civil : civil + formatOffset(timestamp.offsetMinutes);
}

/**
 * Expresses an instant in the given offset.
 */
export function fromInstant(instant: Date, offsetMinutes: number): ZonedTimestamp {
  return {
    wallClockMs: instant.getTime() + offsetMinutes * MS_PER_MINUTE,
    offsetMinutes,
  };
}

/**
 * Milliseconds since the epoch of the instant a zoned timestamp denotes.
 */
export function instantMs(timestamp: ZonedTimestamp): number {
  return timestamp.wallClockMs - timestamp.offsetMinutes * MS_PER_MINUTE;
}

/**
 * The instant a zoned timestamp denotes, as a Date.
 */
export function toInstant(timestamp: ZonedTimestamp): Date {
  return new Date(instantMs(timestamp));
}

/**
 * Reads a naive timestamp as local time in the given offset. Zoned
 * timestamps are returned as they are; no conversion between offsets happens.
 */
export function withOffset(timestamp: Timestamp, offsetMinutes: number): ZonedTimestamp {
  if (isZoned(timestamp)) {
    return timestamp;
  }
  return { wallClockMs: timestamp.wallClockMs, offsetMinutes };
}

/**
 * Adds whole civil days, keeping the offset.
 */
export function addDays<T extends Timestamp>(timestamp: T, days: number): T {
  return { ...timestamp, wallClockMs: timestamp.wallClockMs + days * MS_PER_DAY };
}

/**
 * Orders two zoned timestamps by instant: negative when `a` is earlier.
 */
export function compareInstants(a: ZonedTimestamp, b: ZonedTimestamp): number {
  return instantMs(a) - instantMs(b);
}

/**
 * True when `a` is strictly earlier than `b`.
 */
export function isBefore(a: ZonedTimestamp, b: ZonedTimestamp): boolean {
  return compareInstants(a, b) < 0;
}

/**
 * Midnight at the start of the civil day after `timestamp`, in its own offset.
 */
export function startOfNextDay(timestamp: ZonedTimestamp): ZonedTimestamp {
  const dayStart = Math.floor(timestamp.wallClockMs / MS_PER_DAY) * MS_PER_DAY;
  return { wallClockMs: dayStart + MS_PER_DAY, offsetMinutes: timestamp.offsetMinutes };
}

/**
 * Structural equality: same wall clock and same offset (or both naive).
 */
export function timestampsEqual(a: Timestamp | null, b: Timestamp | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.wallClockMs === b.wallClockMs && a.offsetMinutes === b.offsetMinutes;
}
