/**
 * RuleService - Interval Rule Management
 *
 * Owns each owner's pacing table: lazy seeding with the defaults, validated
 * wholesale replacement, per-repetition interval edits and reset. Every write
 * replaces the owner's whole rule set in one transaction, so scheduling never
 * reads a half-edited table.
 *
 * Validation policy:
 * - malformed rules, empty tables and overlapping ranges are rejected
 *   (VALIDATION_ERROR); an overlap would make lookup ambiguous
 * - gaps are accepted with a warning; repetitions in a gap use the fallback
 *   interval at scheduling time
 */

import { validationError } from '../errors';
import type { IntervalRule } from '../models';
import { FALLBACK_INTERVAL_DAYS, IntervalTable, createDefaultRules } from '../scheduling';
import { parseInput } from '../validation';
import { createLogger, type Logger } from '@/logger';
import type { IntervalRuleRepository } from '@/storage/repositories';
import { intervalRuleListSchema, intervalUpdateListSchema } from './schemas';

/**
 * Dependencies required by the RuleService.
 */
export interface RuleServiceDependencies {
  /** Repository for interval rule persistence */
  ruleRepo: IntervalRuleRepository;
  /** Logger (defaults to a '[Rules]' console logger) */
  logger?: Logger;
}

function formatRange(from: number, to: number): string {
  return from === to ? `${from}` : `${from}-${to}`;
}

/**
 * @example
 * ```typescript
 * const rules = new RuleService({ ruleRepo: new IntervalRuleRepository(db) });
 *
 * const table = await rules.getTable('user_42');
 * await rules.updateIntervals('user_42', [{ repetition: 4, intervalDays: 3 }]);
 * ```
 */
export class RuleService {
  private readonly ruleRepo: IntervalRuleRepository;
  private readonly logger: Logger;

  constructor(deps: RuleServiceDependencies) {
    this.ruleRepo = deps.ruleRepo;
    this.logger = deps.logger ?? createLogger('[Rules]');
  }

  /**
   * The owner's rules in ascending order. An owner with no stored rules is
   * seeded with the default table first.
   */
  async getRules(ownerId: string): Promise<IntervalRule[]> {
    const stored = await this.ruleRepo.findByOwner(ownerId);
    if (stored.length > 0) {
      return stored;
    }

    const seeded = await this.ruleRepo.replaceForOwner(ownerId, createDefaultRules());
    this.logger.info(`seeded ${seeded.length} default rules for owner '${ownerId}'`);
    return seeded;
  }

  /**
   * The owner's rules as a lookup table for scheduling.
   */
  async getTable(ownerId: string): Promise<IntervalTable> {
    return IntervalTable.fromRules(await this.getRules(ownerId));
  }

  /**
   * Replaces the owner's whole table.
   *
   * @param input - Candidate rules (validated here)
   * @returns The stored rules, ascending
   * @throws AppError (VALIDATION_ERROR) for malformed, empty or overlapping rules
   */
  async replaceRules(ownerId: string, input: unknown): Promise<IntervalRule[]> {
    const rules = parseInput(intervalRuleListSchema, input, 'Invalid interval rules');
    const table = IntervalTable.fromRules(rules);

    const overlaps = table.findOverlaps();
    if (overlaps.length > 0) {
      const described = overlaps
        .map(
          ([a, b]) =>
            `${formatRange(a.minRepetition, a.maxRepetition)} and ${formatRange(b.minRepetition, b.maxRepetition)}`
        )
        .join(', ');
      throw validationError(`Interval rules overlap: ${described}`, { overlaps });
    }

    this.warnAboutGaps(ownerId, table);

    return this.ruleRepo.replaceForOwner(ownerId, table.toRules());
  }

  /**
   * Changes the interval of individual single-repetition rows, keeping every
   * other row as it is. Later updates for the same repetition win.
   *
   * @throws AppError (VALIDATION_ERROR) when a repetition has no single-repetition row
   */
  async updateIntervals(ownerId: string, input: unknown): Promise<IntervalRule[]> {
    const updates = parseInput(intervalUpdateListSchema, input, 'Invalid interval updates');
    const rules = await this.getRules(ownerId);

    const byRepetition = new Map<number, number>();
    for (const update of updates) {
      byRepetition.set(update.repetition, update.intervalDays);
    }

    const missing = [...byRepetition.keys()].filter(
      (repetition) =>
        !rules.some((rule) => rule.minRepetition === repetition && rule.maxRepetition === repetition)
    );
    if (missing.length > 0) {
      throw validationError(
        `No single-repetition rule for repetition ${missing.join(', ')}`,
        { missing }
      );
    }

    const next = rules.map((rule) => {
      const intervalDays =
        rule.minRepetition === rule.maxRepetition ? byRepetition.get(rule.minRepetition) : undefined;
      return intervalDays === undefined ? rule : { ...rule, intervalDays };
    });

    return this.ruleRepo.replaceForOwner(ownerId, next);
  }

  /**
   * Replaces the owner's table with the 20-row default.
   */
  async resetToDefault(ownerId: string): Promise<IntervalRule[]> {
    const rules = await this.ruleRepo.replaceForOwner(ownerId, createDefaultRules());
    this.logger.info(`reset rules for owner '${ownerId}' to the default table`);
    return rules;
  }

  private warnAboutGaps(ownerId: string, table: IntervalTable): void {
    const gaps = table.findGaps();
    if (gaps.length === 0) {
      return;
    }
    const described = gaps.map((gap) => formatRange(gap.from, gap.to)).join(', ');
    this.logger.warn(
      `rules for owner '${ownerId}' leave repetition ${described} uncovered; ` +
        `${FALLBACK_INTERVAL_DAYS}-day fallback applies there`
    );
  }
}
