/**
 * Consistency Repairer Unit Tests
 */

import { describe, it, expect } from 'vitest';
import type { CardSchedule } from '../models';
import { formatTimestamp, parseTimestamp } from '../time';
import { describeFix, repair } from './consistency-repairer';

const NOW = new Date('2024-03-10T12:00:00Z');

function consistent(): CardSchedule {
  return {
    repetitionCount: 2,
    firstReviewAt: parseTimestamp('2024-03-02T08:00:00Z'),
    nextDueAt: parseTimestamp('2024-03-11T08:00:00Z'),
    createdAt: parseTimestamp('2024-03-01T08:00:00Z'),
    updatedAt: parseTimestamp('2024-03-10T08:00:00Z'),
  };
}

describe('repair', () => {
  it('leaves a consistent schedule alone', () => {
    const input = consistent();
    const result = repair(input, NOW, 0);

    expect(result.repaired).toBe(false);
    expect(result.fixes).toEqual([]);
    expect(result.schedule).toEqual(input);
  });

  it('backfills a missing streak origin from createdAt', () => {
    const result = repair({ ...consistent(), repetitionCount: 3, firstReviewAt: null }, NOW, 0);

    expect(result.repaired).toBe(true);
    expect(result.fixes).toEqual([{ kind: 'first_review_backfilled', source: 'createdAt' }]);
    expect(result.schedule.firstReviewAt).toEqual(result.schedule.createdAt);
    expect(result.schedule.repetitionCount).toBe(3);
  });

  it('does not invent a streak origin for a fresh card', () => {
    const result = repair({ ...consistent(), repetitionCount: 0, firstReviewAt: null }, NOW, 0);

    expect(result.repaired).toBe(false);
    expect(result.schedule.firstReviewAt).toBeNull();
  });

  it('attaches the default offset to naive fields without shifting them', () => {
    const result = repair(
      {
        ...consistent(),
        createdAt: parseTimestamp('2024-03-01T08:00'),
        nextDueAt: parseTimestamp('2024-03-11 08:00:00'),
      },
      NOW,
      480
    );

    expect(result.fixes).toEqual([
      { kind: 'offset_attached', field: 'createdAt' },
      { kind: 'offset_attached', field: 'nextDueAt' },
    ]);
    expect(formatTimestamp(result.schedule.createdAt)).toBe('2024-03-01T08:00:00.000+08:00');
    expect(formatTimestamp(result.schedule.nextDueAt)).toBe('2024-03-11T08:00:00.000+08:00');
    expect(formatTimestamp(result.schedule.updatedAt)).toBe('2024-03-10T08:00:00.000+00:00');
  });

  it('zones a streak origin copied from a naive createdAt', () => {
    const result = repair(
      { ...consistent(), firstReviewAt: null, createdAt: parseTimestamp('2024-03-01T08:00') },
      NOW,
      0
    );

    expect(result.fixes).toEqual([
      { kind: 'first_review_backfilled', source: 'createdAt' },
      { kind: 'offset_attached', field: 'createdAt' },
      { kind: 'offset_attached', field: 'firstReviewAt' },
    ]);
    expect(result.schedule.firstReviewAt?.offsetMinutes).toBe(0);
  });

  it('fills missing mandatory fields with now', () => {
    const result = repair(
      {
        repetitionCount: 0,
        firstReviewAt: null,
        nextDueAt: null,
        createdAt: null,
        updatedAt: null,
      },
      NOW,
      0
    );

    expect(result.fixes).toEqual([
      { kind: 'missing_field_filled', field: 'createdAt' },
      { kind: 'missing_field_filled', field: 'updatedAt' },
      { kind: 'missing_field_filled', field: 'nextDueAt' },
    ]);
    expect(formatTimestamp(result.schedule.nextDueAt)).toBe('2024-03-10T12:00:00.000+00:00');
    expect(formatTimestamp(result.schedule.createdAt)).toBe('2024-03-10T12:00:00.000+00:00');
  });

  it('backfills from now when createdAt is missing as well', () => {
    const result = repair(
      { ...consistent(), repetitionCount: 4, firstReviewAt: null, createdAt: null },
      NOW,
      0
    );

    expect(result.fixes[0]).toEqual({ kind: 'first_review_backfilled', source: 'now' });
    expect(formatTimestamp(result.schedule.firstReviewAt ?? result.schedule.createdAt)).toBe(
      '2024-03-10T12:00:00.000+00:00'
    );
  });

  it('is idempotent', () => {
    const first = repair(
      {
        repetitionCount: 3,
        firstReviewAt: null,
        nextDueAt: parseTimestamp('2024-03-11T08:00'),
        createdAt: null,
        updatedAt: parseTimestamp('2024-03-10T08:00'),
      },
      NOW,
      480
    );
    const second = repair(first.schedule, new Date('2024-04-01T00:00:00Z'), 480);

    expect(first.repaired).toBe(true);
    expect(second.repaired).toBe(false);
    expect(second.schedule).toEqual(first.schedule);
  });
});

describe('describeFix', () => {
  it('describes each kind of fix', () => {
    expect(describeFix({ kind: 'first_review_backfilled', source: 'createdAt' })).toBe(
      'firstReviewAt backfilled from createdAt'
    );
    expect(describeFix({ kind: 'offset_attached', field: 'nextDueAt' })).toBe(
      'default offset attached to nextDueAt'
    );
    expect(describeFix({ kind: 'missing_field_filled', field: 'updatedAt' })).toBe(
      'missing updatedAt set to now'
    );
  });
});
