/**
 * Console Logger
 *
 * Prefixed, level-filtered console logging shared by the services, storage
 * and CLI. Each component creates its own logger with a bracketed prefix:
 *
 * ```
 * [Cards] repaired card_3f2a... (firstReviewAt backfilled from createdAt)
 * [Rules] seeded 20 default rules for owner 'local'
 * ```
 *
 * Debug and info lines go to `console.log`, warnings to `console.warn` and
 * errors to `console.error`. The `silent` level turns everything off.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@/logger';
 *
 * const logger = createLogger('[Cards]', { level: config.logging.level });
 * logger.warn(`conflict saving ${id}`);
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Levels in increasing severity, for the CLI and config validation */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Configuration options for a logger
 */
export interface LoggerConfig {
  /** Lowest level that is written */
  level: LogLevel;
  /** Whether to prepend an ISO timestamp */
  includeTimestamp: boolean;
  /** Whether to color the level tag (for terminal output) */
  colorize: boolean;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  includeTimestamp: false,
  colorize: process.env.NODE_ENV !== 'production' && !process.env.NO_COLOR,
};

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

type WritableLevel = Exclude<LogLevel, 'silent'>;

function getLevelColor(level: WritableLevel): string {
  switch (level) {
    case 'debug':
      return colors.dim;
    case 'info':
      return colors.cyan;
    case 'warn':
      return colors.yellow;
    case 'error':
      return colors.red;
  }
}

export interface Logger {
  readonly prefix: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** True when a message at `level` would be written */
  isEnabled(level: WritableLevel): boolean;
}

/**
 * Creates a logger writing lines that start with `prefix`.
 *
 * @param prefix - Bracketed component tag, e.g. `[Cards]`
 * @param config - Optional configuration overrides
 */
export function createLogger(prefix: string, config: Partial<LoggerConfig> = {}): Logger {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  const isEnabled = (level: WritableLevel): boolean =>
    LEVEL_RANK[level] >= LEVEL_RANK[finalConfig.level];

  const write = (level: WritableLevel, message: string, details: unknown[]): void => {
    if (!isEnabled(level)) {
      return;
    }

    const tag = level.toUpperCase();
    let line = finalConfig.colorize
      ? `${prefix} ${getLevelColor(level)}${tag}${colors.reset} ${message}`
      : `${prefix} ${tag} ${message}`;

    if (finalConfig.includeTimestamp) {
      line = `[${new Date().toISOString()}] ${line}`;
    }

    if (level === 'error') {
      console.error(line, ...details);
    } else if (level === 'warn') {
      console.warn(line, ...details);
    } else {
      console.log(line, ...details);
    }
  };

  return {
    prefix,
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
    isEnabled,
  };
}
