/**
 * Card Domain Types
 *
 * A Card is a question/answer pair scheduled by the interval rule table.
 * Its scheduling state is kept separate from its content so the scheduling
 * core can operate on the schedule alone.
 *
 * Lifecycle:
 * - Created with repetitionCount = 0, no first review, due immediately
 * - "remembered" reviews advance the streak and push the due date out
 * - a "forgotten" review resets the streak and makes the card due now
 */

import type { Timestamp, ZonedTimestamp } from '../time';

/**
 * Review outcome reported by the learner.
 */
export type ReviewOutcome = 'remembered' | 'forgotten';

/**
 * Scheduling stage derived from the repetition count.
 * - 'fresh': never reviewed, or reset by a forgotten review
 * - 'in_progress': at least one successful review in the current streak
 */
export type ScheduleStage = 'fresh' | 'in_progress';

/**
 * Timestamp fields of a schedule, in the order repair inspects them.
 */
export const SCHEDULE_TIMESTAMP_FIELDS = [
  'createdAt',
  'updatedAt',
  'firstReviewAt',
  'nextDueAt',
] as const;

export type ScheduleTimestampField = (typeof SCHEDULE_TIMESTAMP_FIELDS)[number];

/**
 * Scheduling state as it may arrive from storage or a caller: timestamps may
 * be naive, and fields that should always be present may be missing.
 * Consistency repair turns this into a NormalizedSchedule.
 */
export interface CardSchedule {
  /** Successful reviews since the last reset */
  repetitionCount: number;
  /** Start of the current streak; null for a never-reviewed card */
  firstReviewAt: Timestamp | null;
  /** When the card is next due */
  nextDueAt: Timestamp | null;
  /** When the card was created */
  createdAt: Timestamp | null;
  /** When the card last changed (review, reschedule or edit) */
  updatedAt: Timestamp | null;
}

/**
 * Scheduling state that satisfies every invariant:
 * - all timestamps carry an explicit offset
 * - nextDueAt, createdAt and updatedAt are present
 * - repetitionCount > 0 implies firstReviewAt is set
 */
export interface NormalizedSchedule {
  repetitionCount: number;
  firstReviewAt: ZonedTimestamp | null;
  nextDueAt: ZonedTimestamp;
  createdAt: ZonedTimestamp;
  updatedAt: ZonedTimestamp;
}

/**
 * A card as persisted, owner-scoped.
 *
 * @example
 * ```typescript
 * const card: Card = {
 *   id: 'card_3f2a...',
 *   ownerId: 'user_42',
 *   question: 'Boiling point of water at sea level?',
 *   answer: '100 °C',
 *   schedule: {
 *     repetitionCount: 2,
 *     firstReviewAt: parseTimestamp('2024-01-14T08:00:00.000+00:00'),
 *     nextDueAt: parseTimestamp('2024-01-16T08:00:00.000+00:00'),
 *     createdAt: parseTimestamp('2024-01-14T07:55:00.000+00:00'),
 *     updatedAt: parseTimestamp('2024-01-15T08:03:00.000+00:00'),
 *   },
 *   version: 3,
 * };
 * ```
 */
export interface Card<S extends CardSchedule | NormalizedSchedule = CardSchedule> {
  /** Unique identifier, prefixed 'card_' */
  id: string;
  /** Learner who owns the card */
  ownerId: string;
  /** Prompt side, at most 100 characters */
  question: string;
  /** Answer side, at most 500 characters */
  answer: string;
  /** Scheduling state */
  schedule: S;
  /** Optimistic concurrency version, incremented on every write */
  version: number;
}

/**
 * A card whose schedule has passed consistency repair.
 */
export type RepairedCard = Card<NormalizedSchedule>;
