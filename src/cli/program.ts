/**
 * CLI Program
 *
 * Builds the commander program around injected services. `runCli` parses
 * user arguments, runs the matching command and maps failures to an exit
 * code:
 *
 * - AppError: `Error [CODE]: message` on stderr, exit 1
 * - usage errors: commander's own message, its exit code
 * - anything else propagates to the entry point
 */

import { Command, CommanderError } from 'commander';
import { isAppError } from '@/core/errors';
import { registerCardCommands } from './commands/cards';
import { registerRuleCommands } from './commands/rules';
import { consoleOutput, type CliContext } from './context';
import { red } from './utils/terminal';

/**
 * Global options available on every command.
 */
type GlobalOptions = {
  owner: string;
};

/**
 * Creates the program. Output and exit handling are configured before the
 * commands are added so every sub-command inherits them.
 */
export function createProgram(context: CliContext): Command {
  const output = context.output ?? consoleOutput;
  const program = new Command('cadence');

  program
    .description('Spaced repetition scheduling with editable interval rules')
    .option('-o, --owner <id>', 'Owner to act for', context.defaultOwner)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.log(text.trimEnd()),
      writeErr: (text) => output.error(text.trimEnd()),
    });

  const resolveOwner = (): string => program.opts<GlobalOptions>().owner;

  registerCardCommands(program, context, output, resolveOwner);
  registerRuleCommands(program, context, output, resolveOwner);

  return program;
}

/**
 * Runs the CLI with user arguments (no node/script prefix).
 *
 * @returns The process exit code
 *
 * @example
 * ```typescript
 * const code = await runCli(['review', 'card_1', '--remembered'], context);
 * ```
 */
export async function runCli(argv: string[], context: CliContext): Promise<number> {
  const output = context.output ?? consoleOutput;
  const program = createProgram(context);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version exits carry code 0; commander already printed usage errors
      return error.exitCode;
    }
    if (isAppError(error)) {
      output.error(red(`Error [${error.code}]: ${error.message}`));
      return 1;
    }
    throw error;
  }
}
