/**
 * TimeNormalizer - Offset Presence Guarantee
 *
 * Every timestamp entering or leaving the scheduling core must carry an
 * explicit offset. The normalizer holds the single deployment-wide default
 * offset and attaches it to naive timestamps; timestamps that already carry
 * an offset pass through unchanged (it guarantees presence of an offset, not
 * conversion to one canonical offset).
 *
 * The clock is injected so tests and replays can pin "now".
 */

import {
  fromInstant,
  startOfNextDay,
  withOffset,
  type Timestamp,
  type ZonedTimestamp,
} from './timestamp';

/**
 * Source of the current instant.
 */
export interface Clock {
  now(): Date;
}

/**
 * Clock backed by the system time.
 */
export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that always returns the same instant.
 *
 * @example
 * ```typescript
 * const clock = fixedClock(new Date('2024-01-15T10:00:00Z'));
 * ```
 */
export function fixedClock(instant: Date): Clock {
  return { now: () => new Date(instant.getTime()) };
}

/**
 * Attaches `defaultOffsetMinutes` to a naive timestamp; returns zoned
 * timestamps unchanged.
 */
export function normalizeTimestamp(timestamp: Timestamp, defaultOffsetMinutes: number): ZonedTimestamp {
  return withOffset(timestamp, defaultOffsetMinutes);
}

/**
 * The current instant expressed in the default offset.
 */
export function currentTimestamp(defaultOffsetMinutes: number, clock: Clock = systemClock): ZonedTimestamp {
  return fromInstant(clock.now(), defaultOffsetMinutes);
}

/**
 * Holds the deployment default offset and clock for the components that need
 * to produce or normalize timestamps.
 */
export class TimeNormalizer {
  constructor(
    readonly defaultOffsetMinutes: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Guarantees an explicit offset on `timestamp`.
   */
  normalize(timestamp: Timestamp): ZonedTimestamp {
    return normalizeTimestamp(timestamp, this.defaultOffsetMinutes);
  }

  /**
   * Same as normalize, passing null through.
   */
  normalizeNullable(timestamp: Timestamp | null): ZonedTimestamp | null {
    return timestamp === null ? null : this.normalize(timestamp);
  }

  /**
   * The current instant from the clock, expressed in the default offset.
   */
  now(): ZonedTimestamp {
    return currentTimestamp(this.defaultOffsetMinutes, this.clock);
  }

  /**
   * The current instant as a Date.
   */
  nowInstant(): Date {
    return this.clock.now();
  }

  /**
   * Expresses an arbitrary instant in the default offset.
   */
  at(instant: Date): ZonedTimestamp {
    return fromInstant(instant, this.defaultOffsetMinutes);
  }

  /**
   * Start of the civil day following `instant`, in the default offset. Items
   * due before this moment are "due today".
   */
  endOfDay(instant: Date): ZonedTimestamp {
    return startOfNextDay(this.at(instant));
  }
}
