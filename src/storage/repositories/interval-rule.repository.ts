/**
 * IntervalRule Repository Implementation
 *
 * Data access for an owner's interval rules. A rule set is read as a whole
 * and replaced as a whole: `replaceForOwner` deletes and inserts inside one
 * transaction, so a concurrent reader sees either the old table or the new
 * one, never a mix.
 */

import { asc, count, eq } from 'drizzle-orm';
import type { IntervalRule } from '@/core/models';
import type { AppDatabase } from '../db';
import { intervalRules, type IntervalRuleRow } from '../schema';

function mapToDomain(row: IntervalRuleRow): IntervalRule {
  return {
    minRepetition: row.minRepetition,
    maxRepetition: row.maxRepetition,
    intervalDays: row.intervalDays,
  };
}

/**
 * Repository for interval rules.
 *
 * @example
 * ```typescript
 * const repo = new IntervalRuleRepository(db);
 *
 * await repo.replaceForOwner('user_42', createDefaultRules());
 * const rules = await repo.findByOwner('user_42');
 * ```
 */
export class IntervalRuleRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * The owner's rules ordered by minRepetition. Empty when the owner has
   * none stored.
   */
  async findByOwner(ownerId: string): Promise<IntervalRule[]> {
    const rows = await this.db
      .select()
      .from(intervalRules)
      .where(eq(intervalRules.ownerId, ownerId))
      .orderBy(asc(intervalRules.minRepetition));

    return rows.map(mapToDomain);
  }

  /**
   * Atomically replaces the owner's rule set.
   *
   * better-sqlite3 transactions are synchronous, so the statements run with
   * `.run()` inside the callback.
   *
   * @returns The stored rules, ordered by minRepetition
   */
  async replaceForOwner(ownerId: string, rules: readonly IntervalRule[]): Promise<IntervalRule[]> {
    const createdAt = new Date().toISOString();

    this.db.transaction((tx) => {
      tx.delete(intervalRules).where(eq(intervalRules.ownerId, ownerId)).run();

      if (rules.length > 0) {
        tx.insert(intervalRules)
          .values(
            rules.map((rule) => ({
              ownerId,
              minRepetition: rule.minRepetition,
              maxRepetition: rule.maxRepetition,
              intervalDays: rule.intervalDays,
              createdAt,
            }))
          )
          .run();
      }
    });

    return this.findByOwner(ownerId);
  }

  /**
   * Number of rules stored for the owner.
   */
  async countByOwner(ownerId: string): Promise<number> {
    const result = await this.db
      .select({ value: count() })
      .from(intervalRules)
      .where(eq(intervalRules.ownerId, ownerId));

    return result[0]?.value ?? 0;
  }
}
