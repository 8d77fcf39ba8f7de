/**
 * Scheduling Module - Barrel Export
 *
 * The review-interval computation and card state machine:
 *
 * - IntervalTable / resolveInterval: rule lookup with clamp and fallback
 * - computeReview / transition: the remembered/forgotten state machine
 * - repair: idempotent read-path consistency repair
 * - ReviewScheduler: the above bound to a default offset and clock
 *
 * @example
 * ```typescript
 * import { ReviewScheduler, IntervalTable, createDefaultRules } from '@/core/scheduling';
 *
 * const scheduler = new ReviewScheduler({ defaultOffsetMinutes: 0 });
 * const table = IntervalTable.fromRules(createDefaultRules());
 * const result = scheduler.review(schedule, 'remembered', table);
 * ```
 */

export { ReviewScheduler, type ReviewSchedulerConfig } from './scheduler';

export { IntervalTable } from './interval-table';
export { clampRepetition, resolveInterval } from './interval-resolver';
export { FALLBACK_INTERVAL_DAYS, createDefaultRules } from './default-rules';

export {
  chooseBaseTime,
  computeReview,
  requireReviewable,
  stageOf,
  transition,
  type BaseTimeCandidates,
  type ReviewTransition,
} from './review-state-machine';

export {
  describeFix,
  repair,
  type RepairFix,
  type RepairResult,
} from './consistency-repairer';
