/**
 * CLI Card Commands
 *
 * add, list, due, show, review, edit, reschedule, delete and repair. Each
 * command acts for the owner resolved from the global --owner option.
 *
 * Usage Examples:
 * ```bash
 * cadence add "Capital of France?" "Paris"
 * cadence due --today
 * cadence review card_3f2a... --remembered
 * cadence reschedule card_3f2a... 2024-03-15T09:00+08:00
 * cadence --owner user_42 list
 * ```
 */

import type { Command } from 'commander';
import { validationError } from '@/core/errors';
import type { CardUpdateCommand } from '@/core/cards';
import type { RepairedCard, ReviewOutcome } from '@/core/models';
import { formatTimestamp } from '@/core/time';
import type { CliContext, CliOutput } from '../context';
import {
  bold,
  dim,
  formatCardDetails,
  formatCardLine,
  formatDays,
  green,
  yellow,
} from '../utils/terminal';

/**
 * Options for the review command.
 */
interface ReviewOptions {
  remembered?: boolean;
  forgot?: boolean;
}

/**
 * Options for the edit command.
 */
interface EditOptions {
  question?: string;
  answer?: string;
}

/**
 * Options for the due command.
 */
interface DueOptions {
  today?: boolean;
}

function reviewOutcome(options: ReviewOptions): ReviewOutcome {
  if (options.remembered === options.forgot) {
    throw validationError('Specify exactly one of --remembered or --forgot');
  }
  return options.remembered ? 'remembered' : 'forgotten';
}

function printCards(output: CliOutput, heading: string, cards: RepairedCard[], empty: string): void {
  output.log(bold(`${heading} (${cards.length}):`));
  if (cards.length === 0) {
    output.log(yellow(`  ${empty}`));
    return;
  }
  for (const card of cards) {
    output.log(`  ${formatCardLine(card)}`);
  }
}

/**
 * Registers the card commands on `program`.
 *
 * @param resolveOwner - Returns the owner the invocation acts for
 */
export function registerCardCommands(
  program: Command,
  context: CliContext,
  output: CliOutput,
  resolveOwner: () => string
): void {
  const { cardService } = context;

  program
    .command('add <question> <answer>')
    .description('Create a card (due immediately)')
    .action(async (question: string, answer: string) => {
      const card = await cardService.createCard(resolveOwner(), { question, answer });
      output.log(green(`Created ${card.id}`));
    });

  program
    .command('list')
    .description('List all cards, oldest first')
    .action(async () => {
      const cards = await cardService.listCards(resolveOwner());
      printCards(output, 'Cards', cards, 'No cards yet. Add one with: cadence add <question> <answer>');
    });

  program
    .command('due')
    .description('List cards due now, earliest first')
    .option('--today', 'Include cards due later today')
    .action(async (options: DueOptions) => {
      const cards = await cardService.listDueCards(resolveOwner(), {
        scope: options.today ? 'today' : 'now',
      });
      printCards(
        output,
        options.today ? 'Due today' : 'Due now',
        cards,
        'Nothing to review.'
      );
    });

  program
    .command('show <id>')
    .description('Show a card and its schedule')
    .action(async (id: string) => {
      const card = await cardService.getCard(resolveOwner(), id);
      for (const line of formatCardDetails(card)) {
        output.log(line);
      }
    });

  program
    .command('review <id>')
    .description('Record a review outcome')
    .option('--remembered', 'The answer was recalled')
    .option('--forgot', 'The answer was not recalled')
    .action(async (id: string, options: ReviewOptions) => {
      const outcome = reviewOutcome(options);
      const { card, transition } = await cardService.reviewCard(resolveOwner(), id, outcome);
      const due = formatTimestamp(card.schedule.nextDueAt);

      if (transition.intervalDays === null) {
        output.log(yellow(`Forgotten: streak reset, ${card.id} is due now (${due})`));
        return;
      }

      output.log(
        green(`Remembered: repetition ${card.schedule.repetitionCount}, next due ${due}`) +
          ` (${formatDays(transition.intervalDays)})`
      );
      if (transition.lateReview) {
        output.log(dim('  Late review: interval counted from now'));
      }
    });

  program
    .command('edit <id>')
    .description('Change the question and/or answer')
    .option('-q, --question <text>', 'New question')
    .option('-a, --answer <text>', 'New answer')
    .action(async (id: string, options: EditOptions) => {
      const command: CardUpdateCommand = {};
      if (options.question !== undefined) {
        command.question = options.question;
      }
      if (options.answer !== undefined) {
        command.answer = options.answer;
      }
      const card = await cardService.updateCard(resolveOwner(), id, command);
      output.log(green(`Updated ${card.id}`));
    });

  program
    .command('reschedule <id> <timestamp>')
    .description('Set the next due date (no offset: the default offset applies)')
    .action(async (id: string, timestamp: string) => {
      const card = await cardService.rescheduleCard(resolveOwner(), id, timestamp);
      output.log(green(`Rescheduled ${card.id} to ${formatTimestamp(card.schedule.nextDueAt)}`));
    });

  program
    .command('delete <id>')
    .description('Delete a card')
    .action(async (id: string) => {
      await cardService.deleteCard(resolveOwner(), id);
      output.log(green(`Deleted ${id}`));
    });

  program
    .command('repair')
    .description('Repair and save the schedule of every card')
    .action(async () => {
      const summary = await cardService.repairAll(resolveOwner());
      output.log(`Repaired ${summary.repaired} of ${summary.scanned} cards`);
    });
}
