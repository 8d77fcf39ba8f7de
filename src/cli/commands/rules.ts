/**
 * CLI Rule Commands
 *
 * `rules list`, `rules set`, `rules edit` and `rules reset` for the
 * owner's interval table.
 *
 * Rules are written as `<from>[-<to>]:<days>`:
 * ```bash
 * cadence rules set 1-3:1 4-6:3 7-20:10
 * cadence rules edit 4 5        # repetition 4 now waits 5 days
 * cadence rules reset
 * ```
 */

import type { Command } from 'commander';
import { validationError } from '@/core/errors';
import type { IntervalRule, IntervalUpdate } from '@/core/models';
import type { CliContext, CliOutput } from '../context';
import { bold, formatRuleLine, green } from '../utils/terminal';

const RULE_PATTERN = /^(\d+)(?:-(\d+))?:(\d+)$/;

/**
 * Parses `<from>[-<to>]:<days>` into a rule. Range checks (from ≥ 1, to ≥
 * from, overlaps) are left to the rule service.
 *
 * @throws AppError (VALIDATION_ERROR) when the text does not have that shape
 */
export function parseRuleSpec(spec: string): IntervalRule {
  const match = RULE_PATTERN.exec(spec.trim());
  if (!match) {
    throw validationError(`Invalid rule '${spec}': expected <from>[-<to>]:<days>`);
  }
  const [, from, to, days] = match;
  return {
    minRepetition: Number(from),
    maxRepetition: Number(to ?? from),
    intervalDays: Number(days),
  };
}

function parseInteger(value: string, name: string): number {
  if (!/^\d+$/.test(value)) {
    throw validationError(`${name} must be a non-negative integer, got '${value}'`);
  }
  return Number(value);
}

function printRules(output: CliOutput, rules: IntervalRule[]): void {
  output.log(bold('  Repetition  Interval'));
  for (const rule of rules) {
    output.log(formatRuleLine(rule));
  }
}

/**
 * Creates the `rules` command with its sub-commands.
 *
 * The command is created with `program.command()` so it inherits the
 * program's output and exit settings.
 */
export function registerRuleCommands(
  program: Command,
  context: CliContext,
  output: CliOutput,
  resolveOwner: () => string
): Command {
  const { ruleService } = context;
  const rulesCmd = program.command('rules').description("Show or change the owner's interval table");

  rulesCmd
    .command('list')
    .description('Show the interval table')
    .action(async () => {
      printRules(output, await ruleService.getRules(resolveOwner()));
    });

  rulesCmd
    .command('set <rules...>')
    .description('Replace the whole table, e.g. 1-3:1 4:2 5-20:7')
    .action(async (specs: string[]) => {
      const rules = await ruleService.replaceRules(resolveOwner(), specs.map(parseRuleSpec));
      output.log(green(`Saved ${rules.length} rules`));
      printRules(output, rules);
    });

  rulesCmd
    .command('edit <repetition> <days>')
    .description('Change the interval of one single-repetition row')
    .action(async (repetition: string, days: string) => {
      const update: IntervalUpdate = {
        repetition: parseInteger(repetition, 'repetition'),
        intervalDays: parseInteger(days, 'days'),
      };
      const rules = await ruleService.updateIntervals(resolveOwner(), [update]);
      output.log(green(`Updated repetition ${repetition}`));
      printRules(output, rules);
    });

  rulesCmd
    .command('reset')
    .description('Restore the default table')
    .action(async () => {
      const rules = await ruleService.resetToDefault(resolveOwner());
      output.log(green(`Restored ${rules.length} default rules`));
    });

  return rulesCmd;
}
