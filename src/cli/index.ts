#!/usr/bin/env -S npx tsx
/**
 * CLI Entry Point for Cadence
 *
 * Loads configuration, opens the database, wires the services and hands the
 * arguments to the commander program.
 *
 * Usage:
 * ```bash
 * npm run cli -- add "Capital of France?" "Paris"
 * npm run cli -- due --today
 * npm run cli -- review <card-id> --remembered
 * npm run cli -- rules list
 *
 * # Another owner, another database, UTC+08:00 as default offset
 * SCHEDULER_DEFAULT_OFFSET=+08:00 DATABASE_PATH=/tmp/cards.db npm run cli -- --owner user_42 list
 * ```
 *
 * Dependencies are created once at startup and the connection is closed
 * when the command finishes.
 */

import { CardService } from '@/core/cards';
import { RuleService } from '@/core/rules';
import { ReviewScheduler } from '@/core/scheduling';
import { ConfigValidationError, loadConfig, type Config } from '@/config';
import { createLogger } from '@/logger';
import { openDatabase } from '@/storage/db';
import { CardRepository, IntervalRuleRepository } from '@/storage/repositories';
import { runCli } from './program';
import { dim, red } from './utils/terminal';

/**
 * Main entry point for the CLI application.
 *
 * @returns The process exit code
 */
async function main(): Promise<number> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(red(error.message));
      return 1;
    }
    throw error;
  }

  const logOptions = {
    level: config.logging.level,
    includeTimestamp: config.logging.includeTimestamp,
  };

  const connection = openDatabase(config.database.path);
  try {
    const scheduler = new ReviewScheduler({
      defaultOffsetMinutes: config.scheduling.defaultOffsetMinutes,
    });
    const ruleService = new RuleService({
      ruleRepo: new IntervalRuleRepository(connection.db),
      logger: createLogger('[Rules]', logOptions),
    });
    const cardService = new CardService({
      cardRepo: new CardRepository(connection.db),
      ruleService,
      scheduler,
      logger: createLogger('[Cards]', logOptions),
    });

    return await runCli(process.argv.slice(2), {
      cardService,
      ruleService,
      defaultOwner: config.cli.owner,
    });
  } finally {
    connection.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(red('Fatal error:'));
    console.error(dim(error instanceof Error ? error.message : String(error)));

    // Show stack trace when debugging
    if (process.env.DEBUG && error instanceof Error && error.stack) {
      console.error(dim(error.stack));
    }

    process.exitCode = 1;
  });
