/**
 * Default Interval Rules
 *
 * The pacing every owner starts with, and the table `resetToDefault`
 * restores. Expressed as ranges here for readability, but materialized as one
 * row per repetition (1-20) so each row is independently editable.
 *
 * | Repetition | Interval |
 * |------------|----------|
 * | 1-3        | 1 day    |
 * | 4          | 2 days   |
 * | 5          | 3 days   |
 * | 6          | 5 days   |
 * | 7-8        | 7 days   |
 * | 9-10       | 14 days  |
 * | 11-12      | 30 days  |
 * | 13-20      | 60 days  |
 */

import type { IntervalRule } from '../models';

const DEFAULT_PACING: ReadonlyArray<readonly [from: number, to: number, days: number]> = [
  [1, 3, 1],
  [4, 4, 2],
  [5, 5, 3],
  [6, 6, 5],
  [7, 8, 7],
  [9, 10, 14],
  [11, 12, 30],
  [13, 20, 60],
];

/**
 * Interval used when no rule covers a repetition inside the table's domain.
 */
export const FALLBACK_INTERVAL_DAYS = 1;

/**
 * Builds the 20-row default rule set. Returns fresh objects on every call so
 * callers may hand the result to storage without sharing references.
 */
export function createDefaultRules(): IntervalRule[] {
  const rules: IntervalRule[] = [];
  for (const [from, to, days] of DEFAULT_PACING) {
    for (let repetition = from; repetition <= to; repetition++) {
      rules.push({ minRepetition: repetition, maxRepetition: repetition, intervalDays: days });
    }
  }
  return rules;
}
