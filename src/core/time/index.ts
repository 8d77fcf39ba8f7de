/**
 * Time Module - Barrel Export
 *
 * Offset-aware timestamps and the normalizer that guarantees every timestamp
 * handled by the scheduler carries an explicit offset.
 *
 * @example
 * ```typescript
 * import { TimeNormalizer, parseTimestamp, formatTimestamp } from '@/core/time';
 *
 * const normalizer = new TimeNormalizer(480); // UTC+08:00
 * const zoned = normalizer.normalize(parseTimestamp('2024-03-01 09:00:00'));
 * formatTimestamp(zoned); // '2024-03-01T09:00:00.000+08:00'
 * ```
 */

export {
  MS_PER_DAY,
  addDays,
  compareInstants,
  formatOffset,
  formatTimestamp,
  fromInstant,
  instantMs,
  isBefore,
  isZoned,
  parseOffset,
  parseTimestamp,
  startOfNextDay,
  timestampsEqual,
  toInstant,
  withOffset,
  type Timestamp,
  type ZonedTimestamp,
} from './timestamp';

export {
  TimeNormalizer,
  currentTimestamp,
  fixedClock,
  normalizeTimestamp,
  systemClock,
  type Clock,
} from './normalizer';
