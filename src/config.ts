/**
 * Centralized Configuration Module
 *
 * Type-safe configuration for Cadence, loaded from environment variables and
 * validated with zod. Nothing else in the codebase reads the environment:
 * the CLI entry point calls `loadConfig()` once and injects the pieces each
 * component needs (in particular the single default offset).
 *
 * | Variable                  | Field                             | Default      |
 * |---------------------------|-----------------------------------|--------------|
 * | DATABASE_PATH             | database.path                     | cadence.db   |
 * | SCHEDULER_DEFAULT_OFFSET  | scheduling.defaultOffsetMinutes   | +00:00       |
 * | REVIEW_OWNER              | cli.owner                         | local        |
 * | LOG_LEVEL                 | logging.level                     | info         |
 * | LOG_TIMESTAMPS            | logging.includeTimestamp          | false        |
 * | NODE_ENV                  | nodeEnv                           | development  |
 *
 * Usage:
 *   import { loadConfig } from './config';
 *
 *   const config = loadConfig();
 *   console.log(config.database.path);
 *
 * @module config
 */

import { z } from 'zod';
import { isAppError } from './core/errors';
import { parseOffset } from './core/time';
import { LOG_LEVELS } from './logger';

// =============================================================================
// Configuration Schema
// =============================================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const offsetSchema = z.string().transform((value, ctx) => {
  try {
    return parseOffset(value);
  } catch (error) {
    if (!isAppError(error)) {
      throw error;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    return z.NEVER;
  }
});

/**
 * Zod schema over the raw environment. Keys are the variable names so that
 * issue paths name the offending variable directly.
 */
const envSchema = z
  .object({
    DATABASE_PATH: z.string().min(1).default('cadence.db'),
    SCHEDULER_DEFAULT_OFFSET: offsetSchema.default('+00:00'),
    REVIEW_OWNER: z.string().trim().min(1).default('local'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_TIMESTAMPS: booleanFlag.default('false'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .transform((env) => ({
    nodeEnv: env.NODE_ENV,
    database: {
      path: env.DATABASE_PATH,
    },
    scheduling: {
      defaultOffsetMinutes: env.SCHEDULER_DEFAULT_OFFSET,
    },
    cli: {
      owner: env.REVIEW_OWNER,
    },
    logging: {
      level: env.LOG_LEVEL,
      includeTimestamp: env.LOG_TIMESTAMPS,
    },
  }));

// TypeScript type inferred from the Zod schema
export type Config = z.output<typeof envSchema>;

const ENV_KEYS = [
  'DATABASE_PATH',
  'SCHEDULER_DEFAULT_OFFSET',
  'REVIEW_OWNER',
  'LOG_LEVEL',
  'LOG_TIMESTAMPS',
  'NODE_ENV',
] as const;

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/**
 * Picks the variables this module knows about. Empty strings count as unset,
 * so `LOG_LEVEL= cadence list` falls back to the default.
 */
function pickEnvironment(env: NodeJS.ProcessEnv): Partial<Record<(typeof ENV_KEYS)[number], string>> {
  const picked: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      picked[key] = value.trim();
    }
  }
  return picked;
}

/**
 * Loads and validates configuration.
 *
 * @param env - Environment to read (defaults to `process.env`)
 * @throws {ConfigValidationError} Listing every invalid variable
 *
 * @example
 * ```typescript
 * try {
 *   const config = loadConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Invalid vars:', error.invalidVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(pickEnvironment(env));

  if (!result.success) {
    const invalidVars = result.error.issues.map((issue) => ({
      name: issue.path.length > 0 ? String(issue.path[0]) : '(environment)',
      reason: issue.message,
    }));
    const description = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${description}`, invalidVars);
  }

  return result.data;
}
