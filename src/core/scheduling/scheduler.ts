/**
 * ReviewScheduler - Scheduling Facade
 *
 * Binds the pure scheduling functions to one deployment's default offset and
 * clock, so services can call `review(schedule, outcome, table)` without
 * threading "now" and the offset through every call. The pure functions
 * (`computeReview`, `repair`, `resolveInterval`) remain available for callers
 * that manage time themselves.
 *
 * @example
 * ```typescript
 * const scheduler = new ReviewScheduler({ defaultOffsetMinutes: 480 });
 *
 * // New card
 * const schedule = scheduler.createInitialSchedule();
 *
 * // Before scheduling from stored state
 * const { schedule: clean } = scheduler.repair(stored);
 *
 * // After the learner answers
 * const result = scheduler.review(clean, 'remembered', table);
 * console.log(result.intervalDays, result.schedule.nextDueAt);
 * ```
 */

import type { CardSchedule, IntervalRule, NormalizedSchedule, ReviewOutcome } from '../models';
import { TimeNormalizer, instantMs, systemClock, type Clock } from '../time';
import { repair, type RepairResult } from './consistency-repairer';
import { resolveInterval } from './interval-resolver';
import type { IntervalTable } from './interval-table';
import { transition, type ReviewTransition } from './review-state-machine';

/**
 * Configuration options for the ReviewScheduler.
 */
export interface ReviewSchedulerConfig {
  /**
   * Offset (minutes east of UTC) attached to naive timestamps and used to
   * express "now". One value per deployment.
   * Default: 0 (UTC)
   */
  defaultOffsetMinutes: number;

  /**
   * Source of the current instant.
   * Default: the system clock
   */
  clock: Clock;
}

const DEFAULT_CONFIG: ReviewSchedulerConfig = {
  defaultOffsetMinutes: 0,
  clock: systemClock,
};

export class ReviewScheduler {
  private readonly config: ReviewSchedulerConfig;
  private readonly time: TimeNormalizer;

  constructor(config?: Partial<ReviewSchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.time = new TimeNormalizer(this.config.defaultOffsetMinutes, this.config.clock);
  }

  /**
   * Schedule for a newly created card: no reviews, no streak, due now.
   *
   * @param now - Creation instant (defaults to the clock)
   */
  createInitialSchedule(now?: Date): NormalizedSchedule {
    const createdAt = this.time.at(now ?? this.time.nowInstant());
    return {
      repetitionCount: 0,
      firstReviewAt: null,
      nextDueAt: createdAt,
      createdAt,
      updatedAt: createdAt,
    };
  }

  /**
   * Applies a review outcome.
   *
   * @param schedule - Repaired schedule
   * @param outcome - The learner's answer
   * @param rules - The owner's interval table
   * @param reviewTime - When the review happened (defaults to the clock)
   * @throws AppError (PRECONDITION_FAILED) if the schedule was not repaired
   */
  review(
    schedule: CardSchedule,
    outcome: ReviewOutcome,
    rules: IntervalTable | readonly IntervalRule[],
    reviewTime?: Date
  ): ReviewTransition {
    return transition(
      schedule,
      outcome,
      rules,
      reviewTime ?? this.time.nowInstant(),
      this.config.defaultOffsetMinutes
    );
  }

  /**
   * Runs consistency repair with this deployment's offset.
   */
  repair(schedule: CardSchedule, asOf?: Date): RepairResult {
    return repair(schedule, asOf ?? this.time.nowInstant(), this.config.defaultOffsetMinutes);
  }

  /**
   * Interval for a repetition number, with clamp and fallback applied.
   */
  resolveInterval(repetition: number, rules: IntervalTable | readonly IntervalRule[]): number {
    return resolveInterval(repetition, rules);
  }

  /**
   * A card is due when the check time is at or after its due instant.
   */
  isDue(schedule: NormalizedSchedule, asOf?: Date): boolean {
    const checkTime = asOf ?? this.time.nowInstant();
    return checkTime.getTime() >= instantMs(schedule.nextDueAt);
  }

  /**
   * A card is due today when its due instant falls before the start of the
   * next civil day in the default offset.
   */
  isDueToday(schedule: NormalizedSchedule, asOf?: Date): boolean {
    const endOfDay = this.time.endOfDay(asOf ?? this.time.nowInstant());
    return instantMs(schedule.nextDueAt) < instantMs(endOfDay);
  }

  /**
   * The normalizer this scheduler uses, for callers that need to normalize
   * timestamps the same way (e.g. manual rescheduling input).
   */
  get normalizer(): TimeNormalizer {
    return this.time;
  }

  getConfig(): ReviewSchedulerConfig {
    return { ...this.config };
  }
}
