/**
 * Test Helpers Module
 *
 * Clock control, timestamp shorthands and raw-row fixtures for tests.
 */

import { expect } from 'vitest';
import { isAppError, type ErrorCode } from '../src/core/errors';
import { parseTimestamp, withOffset, type Clock, type ZonedTimestamp } from '../src/core/time';
import type { AppDatabase } from '../src/storage/db';
import { cards, type NewCardRow } from '../src/storage/schema';

// ============================================================================
// Clock
// ============================================================================

/**
 * A clock tests can move.
 */
export interface TestClock extends Clock {
  set(instant: Date): void;
  advanceDays(days: number): void;
}

export function createTestClock(start: Date): TestClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    set: (instant) => {
      current = instant.getTime();
    },
    advanceDays: (days) => {
      current += days * 86_400_000;
    },
  };
}

// ============================================================================
// Timestamps
// ============================================================================

/**
 * Parses text that carries an offset; naive text is read as UTC.
 */
export function ts(text: string): ZonedTimestamp {
  return withOffset(parseTimestamp(text), 0);
}

// ============================================================================
// Fixtures
// ============================================================================

/**
 * Inserts a card row directly, bypassing the repository, to simulate data
 * written by older tools (naive timestamps, missing fields).
 */
export async function insertRawCard(
  db: AppDatabase,
  row: Pick<NewCardRow, 'id' | 'ownerId'> & Partial<NewCardRow>
): Promise<void> {
  await db.insert(cards).values({
    question: 'Legacy question?',
    answer: 'Legacy answer.',
    ...row,
  });
}

// ============================================================================
// Assertions
// ============================================================================

/**
 * Awaits `promise` and asserts it rejects with an AppError of `code`.
 *
 * @returns The error's message, for further assertions
 */
export async function expectAppError(promise: Promise<unknown>, code: ErrorCode): Promise<string> {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  expect(isAppError(caught, code)).toBe(true);
  return isAppError(caught) ? caught.message : '';
}
