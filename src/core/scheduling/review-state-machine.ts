/**
 * Review State Machine
 *
 * Computes a card's next schedule from its current schedule and a review
 * outcome. Two stages, two transitions:
 *
 * - forgotten (any stage -> fresh): the streak resets and the card is due
 *   now. The earliest known engagement is kept: an unset firstReviewAt is
 *   backfilled from createdAt instead of being discarded.
 * - remembered (any stage -> in_progress): the repetition count grows by
 *   one and the next interval (clamped to the table's highest row) is added
 *   to a base time.
 *
 * Base time policy for "remembered": continue the planned cadence from the
 * current due date (falling back to firstReviewAt, createdAt, then now when
 * earlier candidates are absent). If the chosen base lies in the past, the
 * review is late and the interval is measured from now instead, so a
 * backlogged learner's intervals do not stack onto a stale due date.
 *
 * The functions here are pure and synchronous. They expect repaired input;
 * state that still violates an invariant is a caller error and raises
 * PRECONDITION_FAILED rather than being guessed at.
 */

import { preconditionError } from '../errors';
import type {
  CardSchedule,
  IntervalRule,
  NormalizedSchedule,
  ReviewOutcome,
  ScheduleStage,
} from '../models';
import {
  addDays,
  formatTimestamp,
  fromInstant,
  isBefore,
  isZoned,
  normalizeTimestamp,
  type Timestamp,
  type ZonedTimestamp,
} from '../time';
import { clampRepetition, resolveInterval } from './interval-resolver';
import { IntervalTable } from './interval-table';

/**
 * Everything a transition decided, for callers that want more than the new
 * schedule (logging, the CLI, tests).
 */
export interface ReviewTransition {
  outcome: ReviewOutcome;
  /** The schedule after the review */
  schedule: NormalizedSchedule;
  /** Interval applied, or null for a forgotten review */
  intervalDays: number | null;
  /** Repetition number the interval was looked up with (after clamping) */
  pacedRepetition: number | null;
  /** Origin the interval was added to, or null for a forgotten review */
  baseTime: ZonedTimestamp | null;
  /** True when the due date had already passed and "now" replaced it as base */
  lateReview: boolean;
}

/**
 * Candidates for the base time, in order of preference.
 */
export interface BaseTimeCandidates {
  nextDueAt: ZonedTimestamp | null;
  firstReviewAt: ZonedTimestamp | null;
  createdAt: ZonedTimestamp | null;
}

/**
 * Derives the scheduling stage from the repetition count.
 */
export function stageOf(schedule: Pick<CardSchedule, 'repetitionCount'>): ScheduleStage {
  return schedule.repetitionCount === 0 ? 'fresh' : 'in_progress';
}

/**
 * Picks the origin for the next interval.
 *
 * Preference: nextDueAt, then firstReviewAt, then createdAt, then now. A
 * chosen base earlier than `now` is discarded in favour of `now`.
 */
export function chooseBaseTime(
  candidates: BaseTimeCandidates,
  now: ZonedTimestamp
): { baseTime: ZonedTimestamp; lateReview: boolean } {
  const preferred =
    candidates.nextDueAt ?? candidates.firstReviewAt ?? candidates.createdAt ?? now;

  if (isBefore(preferred, now)) {
    return { baseTime: now, lateReview: true };
  }
  return { baseTime: preferred, lateReview: false };
}

function requireZoned(
  value: Timestamp | null,
  field: keyof CardSchedule
): ZonedTimestamp | null {
  if (value === null) {
    return null;
  }
  if (!Number.isFinite(value.wallClockMs)) {
    throw preconditionError(`Schedule field '${field}' is not a valid timestamp`, { field });
  }
  if (!isZoned(value)) {
    throw preconditionError(
      `Schedule field '${field}' has no offset (${formatTimestamp(value)}); run repair before reviewing`,
      { field }
    );
  }
  return value;
}

function requirePresent(
  value: ZonedTimestamp | null,
  field: keyof CardSchedule
): ZonedTimestamp {
  if (value === null) {
    throw preconditionError(
      `Schedule field '${field}' is missing; run repair before reviewing`,
      { field }
    );
  }
  return value;
}

/**
 * Checks the preconditions of a review transition and returns the schedule
 * with its timestamps narrowed to zoned values.
 *
 * @throws AppError (PRECONDITION_FAILED) when the schedule was not repaired
 */
export function requireReviewable(schedule: CardSchedule): NormalizedSchedule {
  const { repetitionCount } = schedule;
  if (!Number.isInteger(repetitionCount) || repetitionCount < 0) {
    throw preconditionError(
      `repetitionCount must be a non-negative integer, got ${repetitionCount}`,
      { field: 'repetitionCount', value: repetitionCount }
    );
  }

  const nextDueAt = requirePresent(requireZoned(schedule.nextDueAt, 'nextDueAt'), 'nextDueAt');
  const createdAt = requirePresent(requireZoned(schedule.createdAt, 'createdAt'), 'createdAt');
  const firstReviewAt = requireZoned(schedule.firstReviewAt, 'firstReviewAt');
  // updatedAt is overwritten by every transition, so only its form is checked
  const updatedAt = requireZoned(schedule.updatedAt, 'updatedAt') ?? createdAt;

  return { repetitionCount, firstReviewAt, nextDueAt, createdAt, updatedAt };
}

/**
 * Runs one review transition and reports how the result was reached.
 *
 * @param schedule - Current (repaired) schedule
 * @param outcome - Whether the learner remembered the card
 * @param rules - The owner's interval rules or table
 * @param now - Instant of the review
 * @param defaultOffsetMinutes - Deployment default offset; "now" is expressed in it
 */
export function transition(
  schedule: CardSchedule,
  outcome: ReviewOutcome,
  rules: IntervalTable | readonly IntervalRule[],
  now: Date,
  defaultOffsetMinutes: number
): ReviewTransition {
  const current = requireReviewable(schedule);
  const nowTs = fromInstant(now, defaultOffsetMinutes);

  if (outcome === 'forgotten') {
    return {
      outcome,
      schedule: {
        repetitionCount: 0,
        firstReviewAt: current.firstReviewAt ?? current.createdAt,
        nextDueAt: nowTs,
        createdAt: current.createdAt,
        updatedAt: nowTs,
      },
      intervalDays: null,
      pacedRepetition: null,
      baseTime: null,
      lateReview: false,
    };
  }

  const table = IntervalTable.from(rules);

  const startsStreak = current.repetitionCount === 0 || current.firstReviewAt === null;
  const firstReviewAt = startsStreak ? nowTs : current.firstReviewAt;
  const repetitionCount = current.repetitionCount + 1;

  const pacedRepetition = clampRepetition(repetitionCount, table);
  const intervalDays = resolveInterval(pacedRepetition, table);

  const { baseTime, lateReview } = chooseBaseTime(
    {
      nextDueAt: current.nextDueAt,
      firstReviewAt,
      createdAt: current.createdAt,
    },
    nowTs
  );

  return {
    outcome,
    schedule: {
      repetitionCount,
      firstReviewAt,
      nextDueAt: normalizeTimestamp(addDays(baseTime, intervalDays), defaultOffsetMinutes),
      createdAt: current.createdAt,
      updatedAt: nowTs,
    },
    intervalDays,
    pacedRepetition,
    baseTime,
    lateReview,
  };
}

/**
 * Computes the schedule after a review.
 *
 * @example
 * ```typescript
 * const next = computeReview(schedule, 'remembered', createDefaultRules(), new Date(), 0);
 * ```
 */
export function computeReview(
  schedule: CardSchedule,
  outcome: ReviewOutcome,
  rules: IntervalTable | readonly IntervalRule[],
  now: Date,
  defaultOffsetMinutes: number
): NormalizedSchedule {
  return transition(schedule, outcome, rules, now, defaultOffsetMinutes).schedule;
}
