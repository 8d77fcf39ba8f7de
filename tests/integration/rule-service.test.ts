/**
 * RuleService Integration Tests
 *
 * Seeding, validation and edits of an owner's interval rules against the
 * real repository.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDefaultRules } from '../../src/core/scheduling';
import { createTestContext, cleanupTestContext, type TestContext } from '../setup';
import { expectAppError } from '../helpers';

describe('RuleService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  describe('getRules', () => {
    it('seeds the default table on first access', async () => {
      const info = vi.spyOn(ctx.logger, 'info');
      expect(await ctx.repos.ruleRepo.countByOwner('alice')).toBe(0);

      const rules = await ctx.ruleService.getRules('alice');

      expect(rules).toEqual(createDefaultRules());
      expect(await ctx.repos.ruleRepo.countByOwner('alice')).toBe(20);
      expect(info).toHaveBeenCalledWith("seeded 20 default rules for owner 'alice'");
    });

    it('seeds only once', async () => {
      const info = vi.spyOn(ctx.logger, 'info');

      await ctx.ruleService.getRules('alice');
      await ctx.ruleService.getRules('alice');

      expect(info).toHaveBeenCalledTimes(1);
    });

    it('returns stored rules untouched', async () => {
      await ctx.repos.ruleRepo.replaceForOwner('alice', [
        { minRepetition: 1, maxRepetition: 2, intervalDays: 4 },
      ]);

      expect(await ctx.ruleService.getRules('alice')).toEqual([
        { minRepetition: 1, maxRepetition: 2, intervalDays: 4 },
      ]);
    });
  });

  describe('replaceRules', () => {
    it('stores a valid table in ascending order', async () => {
      const stored = await ctx.ruleService.replaceRules('alice', [
        { minRepetition: 3, maxRepetition: 5, intervalDays: 4 },
        { minRepetition: 1, maxRepetition: 2, intervalDays: 1 },
      ]);

      expect(stored).toEqual([
        { minRepetition: 1, maxRepetition: 2, intervalDays: 1 },
        { minRepetition: 3, maxRepetition: 5, intervalDays: 4 },
      ]);
    });

    it('rejects overlapping ranges', async () => {
      const message = await expectAppError(
        ctx.ruleService.replaceRules('alice', [
          { minRepetition: 1, maxRepetition: 5, intervalDays: 1 },
          { minRepetition: 3, maxRepetition: 4, intervalDays: 2 },
        ]),
        'VALIDATION_ERROR'
      );

      expect(message).toBe('Interval rules overlap: 1-5 and 3-4');
      expect(await ctx.repos.ruleRepo.countByOwner('alice')).toBe(0);
    });

    it('rejects an empty table', async () => {
      const message = await expectAppError(
        ctx.ruleService.replaceRules('alice', []),
        'VALIDATION_ERROR'
      );

      expect(message).toBe('Invalid interval rules: At least one interval rule is required');
    });

    it('rejects a rule starting below repetition 1', async () => {
      const message = await expectAppError(
        ctx.ruleService.replaceRules('alice', [
          { minRepetition: 0, maxRepetition: 2, intervalDays: 1 },
        ]),
        'VALIDATION_ERROR'
      );

      expect(message).toBe('Invalid interval rules: 0.minRepetition: minRepetition must be at least 1');
    });

    it('rejects a reversed range', async () => {
      const message = await expectAppError(
        ctx.ruleService.replaceRules('alice', [
          { minRepetition: 4, maxRepetition: 2, intervalDays: 1 },
        ]),
        'VALIDATION_ERROR'
      );

      expect(message).toBe(
        'Invalid interval rules: 0.maxRepetition: maxRepetition must not be less than minRepetition'
      );
    });

    it('accepts gaps with a warning', async () => {
      const warn = vi.spyOn(ctx.logger, 'warn');

      const stored = await ctx.ruleService.replaceRules('alice', [
        { minRepetition: 1, maxRepetition: 2, intervalDays: 1 },
        { minRepetition: 5, maxRepetition: 6, intervalDays: 7 },
      ]);

      expect(stored).toHaveLength(2);
      expect(warn).toHaveBeenCalledWith(
        "rules for owner 'alice' leave repetition 3-4 uncovered; 1-day fallback applies there"
      );
    });
  });

  describe('updateIntervals', () => {
    it('changes single-repetition rows and keeps the rest', async () => {
      const rules = await ctx.ruleService.updateIntervals('alice', [
        { repetition: 4, intervalDays: 9 },
      ]);

      expect(rules).toHaveLength(20);
      expect(rules[3]).toEqual({ minRepetition: 4, maxRepetition: 4, intervalDays: 9 });
      expect(rules[4]).toEqual({ minRepetition: 5, maxRepetition: 5, intervalDays: 3 });
    });

    it('applies the last update for a repeated repetition', async () => {
      const rules = await ctx.ruleService.updateIntervals('alice', [
        { repetition: 2, intervalDays: 5 },
        { repetition: 2, intervalDays: 6 },
      ]);

      expect(rules[1].intervalDays).toBe(6);
    });

    it('rejects a repetition that is only covered by a range', async () => {
      await ctx.ruleService.replaceRules('alice', [
        { minRepetition: 1, maxRepetition: 3, intervalDays: 1 },
      ]);

      const message = await expectAppError(
        ctx.ruleService.updateIntervals('alice', [{ repetition: 2, intervalDays: 4 }]),
        'VALIDATION_ERROR'
      );

      expect(message).toBe('No single-repetition rule for repetition 2');
    });

    it('rejects negative intervals', async () => {
      const message = await expectAppError(
        ctx.ruleService.updateIntervals('alice', [{ repetition: 2, intervalDays: -1 }]),
        'VALIDATION_ERROR'
      );

      expect(message).toBe('Invalid interval updates: 0.intervalDays: intervalDays must not be negative');
    });
  });

  describe('resetToDefault', () => {
    it('restores the default table', async () => {
      await ctx.ruleService.replaceRules('alice', [
        { minRepetition: 1, maxRepetition: 1, intervalDays: 30 },
      ]);

      const rules = await ctx.ruleService.resetToDefault('alice');

      expect(rules).toEqual(createDefaultRules());
    });
  });

  describe('getTable', () => {
    it('resolves intervals from the owner\'s rules', async () => {
      await ctx.ruleService.replaceRules('alice', [
        { minRepetition: 1, maxRepetition: 2, intervalDays: 3 },
      ]);

      const table = await ctx.ruleService.getTable('alice');

      expect(table.lookup(2)).toBe(3);
      expect(table.lookup(3)).toBeNull();
    });
  });
});
