/**
 * IntervalRuleRepository Integration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DatabaseConnection } from '../../src/storage/db';
import { IntervalRuleRepository } from '../../src/storage/repositories';
import { createTestDatabase } from '../setup';

describe('IntervalRuleRepository', () => {
  let connection: DatabaseConnection;
  let repo: IntervalRuleRepository;

  beforeEach(() => {
    connection = createTestDatabase();
    repo = new IntervalRuleRepository(connection.db);
  });

  afterEach(() => {
    connection.close();
  });

  it('returns no rules for an owner without any', async () => {
    expect(await repo.findByOwner('alice')).toEqual([]);
    expect(await repo.countByOwner('alice')).toBe(0);
  });

  it('stores rules and returns them ordered by minRepetition', async () => {
    const stored = await repo.replaceForOwner('alice', [
      { minRepetition: 4, maxRepetition: 6, intervalDays: 3 },
      { minRepetition: 1, maxRepetition: 3, intervalDays: 1 },
    ]);

    expect(stored).toEqual([
      { minRepetition: 1, maxRepetition: 3, intervalDays: 1 },
      { minRepetition: 4, maxRepetition: 6, intervalDays: 3 },
    ]);
    expect(await repo.countByOwner('alice')).toBe(2);
  });

  it('replaces the previous set instead of merging', async () => {
    await repo.replaceForOwner('alice', [
      { minRepetition: 1, maxRepetition: 1, intervalDays: 1 },
      { minRepetition: 2, maxRepetition: 2, intervalDays: 2 },
    ]);

    await repo.replaceForOwner('alice', [{ minRepetition: 1, maxRepetition: 5, intervalDays: 4 }]);

    expect(await repo.findByOwner('alice')).toEqual([
      { minRepetition: 1, maxRepetition: 5, intervalDays: 4 },
    ]);
  });

  it('keeps owners separate', async () => {
    await repo.replaceForOwner('alice', [{ minRepetition: 1, maxRepetition: 1, intervalDays: 1 }]);
    await repo.replaceForOwner('bob', [{ minRepetition: 1, maxRepetition: 1, intervalDays: 9 }]);

    expect(await repo.findByOwner('alice')).toEqual([
      { minRepetition: 1, maxRepetition: 1, intervalDays: 1 },
    ]);
    expect(await repo.countByOwner('bob')).toBe(1);
  });

  it('leaves the old set in place when the replacement fails', async () => {
    await repo.replaceForOwner('alice', [{ minRepetition: 1, maxRepetition: 3, intervalDays: 2 }]);

    // Two rows starting at the same repetition violate the unique index
    await expect(
      repo.replaceForOwner('alice', [
        { minRepetition: 1, maxRepetition: 1, intervalDays: 1 },
        { minRepetition: 1, maxRepetition: 2, intervalDays: 5 },
      ])
    ).rejects.toThrow();

    expect(await repo.findByOwner('alice')).toEqual([
      { minRepetition: 1, maxRepetition: 3, intervalDays: 2 },
    ]);
  });
});
