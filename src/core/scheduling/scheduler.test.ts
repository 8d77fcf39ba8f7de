/**
 * ReviewScheduler Unit Tests
 *
 * The facade's own behaviour: initial schedules, due checks and the default
 * offset/clock it binds. Transition details are covered by the state machine
 * tests.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { fixedClock, formatTimestamp, parseTimestamp, withOffset } from '../time';
import type { NormalizedSchedule } from '../models';
import { createDefaultRules } from './default-rules';
import { IntervalTable } from './interval-table';
import { ReviewScheduler } from './scheduler';

const NOW = new Date('2024-03-10T12:00:00Z');

function dueAt(text: string): NormalizedSchedule {
  const createdAt = withOffset(parseTimestamp('2024-03-01T00:00:00Z'), 0);
  return {
    repetitionCount: 1,
    firstReviewAt: createdAt,
    nextDueAt: withOffset(parseTimestamp(text), 0),
    createdAt,
    updatedAt: createdAt,
  };
}

describe('ReviewScheduler', () => {
  let scheduler: ReviewScheduler;

  beforeEach(() => {
    scheduler = new ReviewScheduler({ defaultOffsetMinutes: 0, clock: fixedClock(NOW) });
  });

  describe('createInitialSchedule', () => {
    it('creates a fresh schedule due immediately', () => {
      const schedule = scheduler.createInitialSchedule();

      expect(schedule.repetitionCount).toBe(0);
      expect(schedule.firstReviewAt).toBeNull();
      expect(formatTimestamp(schedule.nextDueAt)).toBe('2024-03-10T12:00:00.000+00:00');
      expect(schedule.createdAt).toEqual(schedule.nextDueAt);
      expect(schedule.updatedAt).toEqual(schedule.nextDueAt);
    });

    it('expresses the creation time in the default offset', () => {
      const east = new ReviewScheduler({ defaultOffsetMinutes: 480 });
      const schedule = east.createInitialSchedule(NOW);

      expect(formatTimestamp(schedule.createdAt)).toBe('2024-03-10T20:00:00.000+08:00');
    });
  });

  describe('review', () => {
    it('uses the clock when no review time is given', () => {
      const table = IntervalTable.fromRules(createDefaultRules());
      const result = scheduler.review(scheduler.createInitialSchedule(), 'remembered', table);

      expect(formatTimestamp(result.schedule.nextDueAt)).toBe('2024-03-11T12:00:00.000+00:00');
    });

    it('repeats forgotten reviews without drifting the streak origin', () => {
      const table = IntervalTable.fromRules(createDefaultRules());
      const once = scheduler.review(scheduler.createInitialSchedule(), 'remembered', table);
      const lapse = scheduler.review(once.schedule, 'forgotten', table);
      const again = scheduler.review(lapse.schedule, 'forgotten', table);

      expect(again.schedule.repetitionCount).toBe(0);
      expect(again.schedule.firstReviewAt).toEqual(once.schedule.firstReviewAt);
    });
  });

  describe('repair', () => {
    it('uses the configured offset', () => {
      const east = new ReviewScheduler({ defaultOffsetMinutes: -300, clock: fixedClock(NOW) });
      const result = east.repair({
        repetitionCount: 0,
        firstReviewAt: null,
        nextDueAt: parseTimestamp('2024-03-11T08:00'),
        createdAt: parseTimestamp('2024-03-01T08:00:00Z'),
        updatedAt: parseTimestamp('2024-03-01T08:00:00Z'),
      });

      expect(formatTimestamp(result.schedule.nextDueAt)).toBe('2024-03-11T08:00:00.000-05:00');
    });
  });

  describe('resolveInterval', () => {
    it('delegates to the resolver', () => {
      expect(scheduler.resolveInterval(21, createDefaultRules())).toBe(60);
    });
  });

  describe('isDue', () => {
    it('is due at the due instant', () => {
      expect(scheduler.isDue(dueAt('2024-03-10T12:00:00Z'))).toBe(true);
    });

    it('is not due a millisecond before', () => {
      expect(scheduler.isDue(dueAt('2024-03-10T12:00:00.001Z'))).toBe(false);
    });
  });

  describe('isDueToday', () => {
    it('includes the rest of the civil day', () => {
      expect(scheduler.isDueToday(dueAt('2024-03-10T23:59:59Z'))).toBe(true);
    });

    it('excludes the next day', () => {
      expect(scheduler.isDueToday(dueAt('2024-03-11T00:00:00Z'))).toBe(false);
    });
  });

  describe('getConfig', () => {
    it('returns a copy of the configuration', () => {
      const config = scheduler.getConfig();
      config.defaultOffsetMinutes = 60;

      expect(scheduler.getConfig().defaultOffsetMinutes).toBe(0);
    });

    it('defaults to UTC', () => {
      expect(new ReviewScheduler().getConfig().defaultOffsetMinutes).toBe(0);
    });
  });
});
