/**
 * IntervalResolver - Total Interval Lookup
 *
 * Turns the table's partial lookup into a total function. Two distinct
 * policies apply to a miss:
 *
 * - Clamp: a repetition past the highest configured repetition reuses that
 *   highest row's interval. Pacing plateaus; it neither keeps growing nor
 *   drops back to a short default.
 * - Fallback: a repetition inside the table's domain that no rule covers (a
 *   gap), or any lookup against an empty table, gets FALLBACK_INTERVAL_DAYS.
 *
 * A due date must always be computable, so neither case raises.
 */

import type { IntervalRule } from '../models';
import { FALLBACK_INTERVAL_DAYS } from './default-rules';
import { IntervalTable } from './interval-table';

/**
 * The repetition number to pace by: `repetition` capped at the table's
 * highest configured repetition. Unchanged for an empty table.
 */
export function clampRepetition(repetition: number, table: IntervalTable): number {
  const max = table.maxRepetition;
  return max === null ? repetition : Math.min(repetition, max);
}

/**
 * Interval in days for `repetition` under `rules`, applying clamp then
 * fallback.
 *
 * @example
 * ```typescript
 * const rules = createDefaultRules();
 * resolveInterval(4, rules);   // 2
 * resolveInterval(20, rules);  // 60
 * resolveInterval(500, rules); // 60 (clamped to repetition 20)
 * ```
 */
export function resolveInterval(
  repetition: number,
  rules: IntervalTable | readonly IntervalRule[]
): number {
  const table = IntervalTable.from(rules);
  if (table.isEmpty) {
    return FALLBACK_INTERVAL_DAYS;
  }
  return table.lookup(clampRepetition(repetition, table)) ?? FALLBACK_INTERVAL_DAYS;
}
