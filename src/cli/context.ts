/**
 * CLI Context
 *
 * Everything a command needs, injected so tests can drive the program
 * in-process against an in-memory database and capture its output.
 */

import type { CardService } from '@/core/cards';
import type { RuleService } from '@/core/rules';

/**
 * Where commands write. Defaults to the console.
 */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

export interface CliContext {
  cardService: CardService;
  ruleService: RuleService;
  /** Owner used when --owner is not given */
  defaultOwner: string;
  output?: CliOutput;
}

export const consoleOutput: CliOutput = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};
