/**
 * IntervalTable Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { createDefaultRules } from './default-rules';
import { IntervalTable } from './interval-table';

describe('IntervalTable', () => {
  describe('fromRules', () => {
    it('sorts rules by minRepetition', () => {
      const table = IntervalTable.fromRules([
        { minRepetition: 5, maxRepetition: 5, intervalDays: 3 },
        { minRepetition: 1, maxRepetition: 4, intervalDays: 1 },
      ]);

      expect(table.toRules().map((rule) => rule.minRepetition)).toEqual([1, 5]);
    });

    it('copies its input', () => {
      const rules = [{ minRepetition: 1, maxRepetition: 1, intervalDays: 1 }];
      const table = IntervalTable.fromRules(rules);

      rules[0].intervalDays = 99;

      expect(table.lookup(1)).toBe(1);
    });
  });

  describe('lookup', () => {
    const table = IntervalTable.fromRules(createDefaultRules());

    it('finds the interval of the covering rule', () => {
      expect(table.lookup(1)).toBe(1);
      expect(table.lookup(4)).toBe(2);
      expect(table.lookup(12)).toBe(30);
      expect(table.lookup(20)).toBe(60);
    });

    it('returns null past the last rule', () => {
      expect(table.lookup(21)).toBeNull();
    });
  });

  describe('maxRepetition', () => {
    it('is null for an empty table', () => {
      expect(IntervalTable.fromRules([]).maxRepetition).toBeNull();
      expect(IntervalTable.fromRules([]).isEmpty).toBe(true);
    });

    it('is the highest covered repetition', () => {
      const table = IntervalTable.fromRules(createDefaultRules());

      expect(table.maxRepetition).toBe(20);
      expect(table.size).toBe(20);
    });
  });

  describe('findGaps', () => {
    it('is empty for the default rules', () => {
      expect(IntervalTable.fromRules(createDefaultRules()).findGaps()).toEqual([]);
    });

    it('reports uncovered ranges including a missing start', () => {
      const table = IntervalTable.fromRules([
        { minRepetition: 2, maxRepetition: 3, intervalDays: 1 },
        { minRepetition: 6, maxRepetition: 8, intervalDays: 4 },
      ]);

      expect(table.findGaps()).toEqual([
        { from: 1, to: 1 },
        { from: 4, to: 5 },
      ]);
    });
  });

  describe('findOverlaps', () => {
    it('finds overlaps with an earlier wide rule, not only neighbours', () => {
      const wide = { minRepetition: 1, maxRepetition: 10, intervalDays: 1 };
      const inner = { minRepetition: 3, maxRepetition: 4, intervalDays: 2 };
      const later = { minRepetition: 8, maxRepetition: 12, intervalDays: 5 };
      const table = IntervalTable.fromRules([later, inner, wide]);

      expect(table.findOverlaps()).toEqual([
        [wide, inner],
        [wide, later],
      ]);
    });

    it('is empty for adjacent rules', () => {
      const table = IntervalTable.fromRules([
        { minRepetition: 1, maxRepetition: 3, intervalDays: 1 },
        { minRepetition: 4, maxRepetition: 6, intervalDays: 2 },
      ]);

      expect(table.findOverlaps()).toEqual([]);
    });
  });
});
