/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger } from '../../src/logger';

describe('createLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('writes prefixed lines tagged with the level', () => {
    const logger = createLogger('[Cards]', { colorize: false });

    logger.info('created card_1');

    expect(console.log).toHaveBeenCalledWith('[Cards] INFO created card_1');
  });

  it('routes warnings and errors to their console methods', () => {
    const logger = createLogger('[Cards]', { colorize: false });
    const cause = new Error('disk full');

    logger.warn('conflict writing card_1 at version 1');
    logger.error('save failed', cause);

    expect(console.warn).toHaveBeenCalledWith('[Cards] WARN conflict writing card_1 at version 1');
    expect(console.error).toHaveBeenCalledWith('[Cards] ERROR save failed', cause);
  });

  it('drops messages below the configured level', () => {
    const logger = createLogger('[Rules]', { level: 'warn', colorize: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(logger.isEnabled('info')).toBe(false);
    expect(logger.isEnabled('error')).toBe(true);
  });

  it('writes nothing when silent', () => {
    const logger = createLogger('[Rules]', { level: 'silent' });

    logger.error('hidden');

    expect(console.error).not.toHaveBeenCalled();
  });

  it('colors the level tag', () => {
    const logger = createLogger('[Rules]', { colorize: true });

    logger.warn('gap');

    expect(console.warn).toHaveBeenCalledWith('[Rules] \x1b[33mWARN\x1b[0m gap');
  });

  it('prepends an ISO timestamp when asked', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-10T12:00:00Z'));
    const logger = createLogger('[CLI]', { colorize: false, includeTimestamp: true });

    logger.info('ready');

    expect(console.log).toHaveBeenCalledWith('[2024-03-10T12:00:00.000Z] [CLI] INFO ready');
  });
});
