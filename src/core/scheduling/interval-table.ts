/**
 * IntervalTable - Ordered Rule Lookup
 *
 * An immutable, sorted view over one owner's interval rules. Lookup is pure:
 * it finds the rule whose range contains a repetition number, or reports
 * that none does. Deciding what to do about a miss is the resolver's job.
 *
 * Tables are never edited in place. Rule changes build a new table from the
 * new rule list, so a reader can never observe a half-updated set.
 */

import type { IntervalRule } from '../models';

export class IntervalTable {
  private readonly rules: readonly IntervalRule[];

  private constructor(rules: readonly IntervalRule[]) {
    this.rules = rules;
  }

  /**
   * Builds a table from rules in any order. The input is copied and sorted
   * by minRepetition ascending.
   */
  static fromRules(rules: readonly IntervalRule[]): IntervalTable {
    const sorted = rules
      .map((rule) => Object.freeze({ ...rule }))
      .sort((a, b) => a.minRepetition - b.minRepetition);
    return new IntervalTable(Object.freeze(sorted));
  }

  /**
   * Accepts either a table or a plain rule list.
   */
  static from(source: IntervalTable | readonly IntervalRule[]): IntervalTable {
    return source instanceof IntervalTable ? source : IntervalTable.fromRules(source);
  }

  /**
   * Interval configured for `repetition`, or null when no rule covers it
   * (a gap, or a repetition past the last rule).
   */
  lookup(repetition: number): number | null {
    for (const rule of this.rules) {
      if (rule.minRepetition <= repetition && repetition <= rule.maxRepetition) {
        return rule.intervalDays;
      }
    }
    return null;
  }

  /**
   * Highest repetition number covered by any rule, or null for an empty table.
   */
  get maxRepetition(): number | null {
    if (this.rules.length === 0) {
      return null;
    }
    return Math.max(...this.rules.map((rule) => rule.maxRepetition));
  }

  get size(): number {
    return this.rules.length;
  }

  get isEmpty(): boolean {
    return this.rules.length === 0;
  }

  /**
   * The rules in ascending order, as copies.
   */
  toRules(): IntervalRule[] {
    return this.rules.map((rule) => ({ ...rule }));
  }

  /**
   * Uncovered repetition ranges between the first repetition (1) and
   * maxRepetition. Empty for a contiguous table.
   */
  findGaps(): Array<{ from: number; to: number }> {
    const gaps: Array<{ from: number; to: number }> = [];
    let expected = 1;
    for (const rule of this.rules) {
      if (rule.minRepetition > expected) {
        gaps.push({ from: expected, to: rule.minRepetition - 1 });
      }
      expected = Math.max(expected, rule.maxRepetition + 1);
    }
    return gaps;
  }

  /**
   * Pairs of rules whose repetition ranges intersect.
   */
  findOverlaps(): Array<[IntervalRule, IntervalRule]> {
    const overlaps: Array<[IntervalRule, IntervalRule]> = [];
    // Rule reaching furthest so far; any later rule starting inside it overlaps
    let reach: IntervalRule | null = null;
    for (const rule of this.rules) {
      if (reach !== null && rule.minRepetition <= reach.maxRepetition) {
        overlaps.push([{ ...reach }, { ...rule }]);
      }
      if (reach === null || rule.maxRepetition > reach.maxRepetition) {
        reach = rule;
      }
    }
    return overlaps;
  }
}
