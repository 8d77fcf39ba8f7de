/**
 * Consistency Repairer
 *
 * Read-path pass that brings persisted scheduling state back in line with
 * the schedule invariants before anything schedules from it. Checks run in a
 * fixed order and each is independent:
 *
 * 1. Streak origin: a card with repetitionCount > 0 but no firstReviewAt gets
 *    firstReviewAt := createdAt (or now when createdAt is absent too).
 * 2. Offsets: every present timestamp without an explicit offset gets the
 *    deployment default offset attached. Wall clocks are not shifted.
 * 3. Mandatory fields: a missing nextDueAt becomes now (due immediately);
 *    missing createdAt/updatedAt become now.
 *
 * The pass is idempotent: a repaired schedule satisfies every check, so a
 * second run reports no fixes. Callers persist the result only when
 * `repaired` is true.
 */

import type { CardSchedule, NormalizedSchedule, ScheduleTimestampField } from '../models';
import { SCHEDULE_TIMESTAMP_FIELDS } from '../models';
import { fromInstant, isZoned, withOffset, type Timestamp } from '../time';

/**
 * One correction applied by repair.
 */
export type RepairFix =
  | { kind: 'first_review_backfilled'; source: 'createdAt' | 'now' }
  | { kind: 'offset_attached'; field: ScheduleTimestampField }
  | { kind: 'missing_field_filled'; field: 'nextDueAt' | 'createdAt' | 'updatedAt' };

export interface RepairResult {
  /** The schedule with all invariants satisfied */
  schedule: NormalizedSchedule;
  /** True when at least one fix was applied */
  repaired: boolean;
  /** Fixes in the order they were applied */
  fixes: RepairFix[];
}

/**
 * Short human-readable description of a fix, for logs.
 */
export function describeFix(fix: RepairFix): string {
  switch (fix.kind) {
    case 'first_review_backfilled':
      return `firstReviewAt backfilled from ${fix.source}`;
    case 'offset_attached':
      return `default offset attached to ${fix.field}`;
    case 'missing_field_filled':
      return `missing ${fix.field} set to now`;
  }
}

/**
 * Repairs a schedule.
 *
 * @param schedule - State as read from storage
 * @param now - Current instant, used where a value has to be invented
 * @param defaultOffsetMinutes - Offset attached to naive timestamps
 *
 * @example
 * ```typescript
 * const { schedule, repaired } = repair(stored, new Date(), 480);
 * if (repaired) {
 *   await cardRepo.saveSchedule(card.id, schedule, card.version);
 * }
 * ```
 */
export function repair(
  schedule: CardSchedule,
  now: Date,
  defaultOffsetMinutes: number
): RepairResult {
  const fixes: RepairFix[] = [];
  const nowTs = fromInstant(now, defaultOffsetMinutes);
  const working: Record<ScheduleTimestampField, Timestamp | null> = {
    createdAt: schedule.createdAt,
    updatedAt: schedule.updatedAt,
    firstReviewAt: schedule.firstReviewAt,
    nextDueAt: schedule.nextDueAt,
  };

  // 1. repetitionCount > 0 requires a streak origin
  if (schedule.repetitionCount > 0 && working.firstReviewAt === null) {
    if (working.createdAt !== null) {
      working.firstReviewAt = working.createdAt;
      fixes.push({ kind: 'first_review_backfilled', source: 'createdAt' });
    } else {
      working.firstReviewAt = nowTs;
      fixes.push({ kind: 'first_review_backfilled', source: 'now' });
    }
  }

  // 2. every present timestamp carries an offset
  for (const field of SCHEDULE_TIMESTAMP_FIELDS) {
    const value = working[field];
    if (value !== null && !isZoned(value)) {
      working[field] = withOffset(value, defaultOffsetMinutes);
      fixes.push({ kind: 'offset_attached', field });
    }
  }

  // 3. mandatory fields
  const createdAt = working.createdAt === null ? nowTs : withOffset(working.createdAt, defaultOffsetMinutes);
  if (working.createdAt === null) {
    fixes.push({ kind: 'missing_field_filled', field: 'createdAt' });
  }
  const updatedAt = working.updatedAt === null ? nowTs : withOffset(working.updatedAt, defaultOffsetMinutes);
  if (working.updatedAt === null) {
    fixes.push({ kind: 'missing_field_filled', field: 'updatedAt' });
  }
  const nextDueAt = working.nextDueAt === null ? nowTs : withOffset(working.nextDueAt, defaultOffsetMinutes);
  if (working.nextDueAt === null) {
    fixes.push({ kind: 'missing_field_filled', field: 'nextDueAt' });
  }

  return {
    schedule: {
      repetitionCount: schedule.repetitionCount,
      firstReviewAt:
        working.firstReviewAt === null ? null : withOffset(working.firstReviewAt, defaultOffsetMinutes),
      nextDueAt,
      createdAt,
      updatedAt,
    },
    repaired: fixes.length > 0,
    fixes,
  };
}
