/**
 * IntervalRule Domain Types
 *
 * An interval rule maps a range of repetition numbers to the number of days
 * until the next review. Each learner (owner) has their own ordered set of
 * rules; together they should cover repetitions 1, 2, 3, ... contiguously.
 *
 * The default set stores one row per repetition (1 through 20) rather than
 * ranges, so each row can be edited on its own.
 */

/**
 * A single (repetition range -> interval) rule.
 *
 * @example
 * ```typescript
 * // Repetitions 7 and 8 wait a week
 * const rule: IntervalRule = { minRepetition: 7, maxRepetition: 8, intervalDays: 7 };
 * ```
 */
export interface IntervalRule {
  /** First repetition number covered (inclusive, >= 1) */
  minRepetition: number;
  /** Last repetition number covered (inclusive, >= minRepetition) */
  maxRepetition: number;
  /** Days until the next review for repetitions in this range (>= 0) */
  intervalDays: number;
}

/**
 * A single-row interval edit: set the interval used after `repetition`.
 */
export interface IntervalUpdate {
  repetition: number;
  intervalDays: number;
}
