/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing terminal output, plus formatters
 * for the card and rule listings the commands print.
 *
 * Colors are skipped when the NO_COLOR environment variable is set
 * (https://no-color.org), which also keeps test output plain.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatCardLine } from './terminal';
 *
 * output.log(bold('Due cards:'));
 * output.log(formatCardLine(card));
 * ```
 */

import type { IntervalRule, RepairedCard } from '@/core/models';
import { stageOf } from '@/core/scheduling';
import { formatTimestamp } from '@/core/time';

// =============================================================================
// Text Styles and Colors
// =============================================================================

function colorEnabled(): boolean {
  return !process.env.NO_COLOR;
}

const style =
  (open: string) =>
  (s: string): string =>
    colorEnabled() ? `${open}${s}\x1b[0m` : s;

/**
 * Makes text bold/bright in the terminal.
 * Use for emphasis on headings or key values.
 *
 * @example
 * output.log(bold('Due cards:'));
 */
export const bold = style('\x1b[1m');

/**
 * Makes text dim/faded. Use for secondary information like ids or hints.
 */
export const dim = style('\x1b[2m');

/** Success messages */
export const green = style('\x1b[32m');

/** Warnings and items needing attention */
export const yellow = style('\x1b[33m');

/** Errors */
export const red = style('\x1b[31m');

/** Timestamps and other values */
export const cyan = style('\x1b[36m');

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * `1 day` / `14 days`
 */
export function formatDays(days: number): string {
  return `${days} ${days === 1 ? 'day' : 'days'}`;
}

/**
 * `4` for a single repetition, `7-8` for a range.
 */
export function formatRepetitionRange(rule: IntervalRule): string {
  return rule.minRepetition === rule.maxRepetition
    ? `${rule.minRepetition}`
    : `${rule.minRepetition}-${rule.maxRepetition}`;
}

/**
 * One line of a rule listing.
 *
 * @example
 * formatRuleLine({ minRepetition: 7, maxRepetition: 8, intervalDays: 7 });
 * // "  7-8         7 days"
 */
export function formatRuleLine(rule: IntervalRule): string {
  return `  ${formatRepetitionRange(rule).padEnd(12)}${formatDays(rule.intervalDays)}`;
}

/**
 * One line of a card listing: id, repetition count, due date and question.
 *
 * @example
 * formatCardLine(card);
 * // "card_1  rep 2  due 2024-03-11T12:00:00.000+00:00  Capital of France?"
 */
export function formatCardLine(card: RepairedCard): string {
  return [
    dim(card.id),
    `rep ${card.schedule.repetitionCount}`,
    `due ${cyan(formatTimestamp(card.schedule.nextDueAt))}`,
    card.question,
  ].join('  ');
}

/**
 * Multi-line detail view of a card.
 */
export function formatCardDetails(card: RepairedCard): string[] {
  const { schedule } = card;
  return [
    bold(card.id),
    `  Question:     ${card.question}`,
    `  Answer:       ${card.answer}`,
    `  Repetitions:  ${schedule.repetitionCount} (${stageOf(schedule)})`,
    `  First review: ${schedule.firstReviewAt === null ? 'never' : formatTimestamp(schedule.firstReviewAt)}`,
    `  Next due:     ${cyan(formatTimestamp(schedule.nextDueAt))}`,
    `  Created:      ${formatTimestamp(schedule.createdAt)}`,
    `  Updated:      ${formatTimestamp(schedule.updatedAt)}`,
  ];
}
