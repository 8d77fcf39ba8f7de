/**
 * Card Repository Implementation
 *
 * Data access for Card entities. Maps between the flat `cards` table (text
 * timestamp columns) and the nested domain model (a CardSchedule of parsed
 * Timestamps).
 *
 * Reads return schedules exactly as stored, naive or incomplete values
 * included; consistency repair is the card service's job. Text that cannot be
 * parsed as a timestamp at all is not repairable and raises DATA_CORRUPTION.
 *
 * Every write increments `version`. Writes that carry an expected version
 * only apply when the stored row still has it, so two concurrent
 * read-modify-write cycles cannot both succeed.
 */

import { and, asc, eq, sql } from 'drizzle-orm';
import { AppError, ErrorCodes, conflictError, isAppError, notFoundError } from '@/core/errors';
import type { Card, CardSchedule, NormalizedSchedule, ScheduleTimestampField } from '@/core/models';
import { formatTimestamp, parseTimestamp, type Timestamp } from '@/core/time';
import type { AppDatabase } from '../db';
import { cards, type CardRow } from '../schema';
import type { Repository } from './base';

/**
 * Input type for creating a new Card.
 */
export interface CreateCardInput {
  /** Unique identifier - a prefixed UUID (e.g., 'card_3f2a...') */
  id: string;
  ownerId: string;
  question: string;
  answer: string;
  /** Initial scheduling state */
  schedule: NormalizedSchedule;
}

/**
 * Content fields that may change after creation. Only specified fields are
 * written.
 */
export interface UpdateCardContentInput {
  question?: string;
  answer?: string;
}

const COLUMN_NAMES: Record<ScheduleTimestampField, string> = {
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  firstReviewAt: 'first_review_at',
  nextDueAt: 'next_due_at',
};

/**
 * Parses a stored timestamp column.
 *
 * @throws AppError (DATA_CORRUPTION) when the text is not a timestamp
 */
function parseStoredTimestamp(
  value: string | null,
  field: ScheduleTimestampField,
  cardId: string
): Timestamp | null {
  if (value === null) {
    return null;
  }
  try {
    return parseTimestamp(value);
  } catch (error) {
    if (!isAppError(error, ErrorCodes.INVALID_TIMESTAMP)) {
      throw error;
    }
    throw new AppError(
      ErrorCodes.DATA_CORRUPTION,
      `Card '${cardId}' has an unreadable ${COLUMN_NAMES[field]} value '${value}'`,
      { cardId, field, value }
    );
  }
}

function formatNullable(value: Timestamp | null): string | null {
  return value === null ? null : formatTimestamp(value);
}

/**
 * Maps a database row to a Card domain model.
 */
function mapToDomain(row: CardRow): Card {
  return {
    id: row.id,
    ownerId: row.ownerId,
    question: row.question,
    answer: row.answer,
    schedule: {
      repetitionCount: row.repetitionCount,
      firstReviewAt: parseStoredTimestamp(row.firstReviewAt, 'firstReviewAt', row.id),
      nextDueAt: parseStoredTimestamp(row.nextDueAt, 'nextDueAt', row.id),
      createdAt: parseStoredTimestamp(row.createdAt, 'createdAt', row.id),
      updatedAt: parseStoredTimestamp(row.updatedAt, 'updatedAt', row.id),
    },
    version: row.version,
  };
}

/**
 * Flattens a schedule into its columns.
 */
function scheduleColumns(schedule: CardSchedule) {
  return {
    repetitionCount: schedule.repetitionCount,
    firstReviewAt: formatNullable(schedule.firstReviewAt),
    nextDueAt: formatNullable(schedule.nextDueAt),
    createdAt: formatNullable(schedule.createdAt),
    updatedAt: formatNullable(schedule.updatedAt),
  };
}

/**
 * Repository for Card entity data access operations.
 *
 * @example
 * ```typescript
 * const repo = new CardRepository(db);
 *
 * const card = await repo.findById('card_3f2a...');
 *
 * // Persist a new schedule, failing if someone else wrote in between
 * const saved = await repo.saveSchedule(card.id, next, card.version);
 * ```
 */
export class CardRepository implements Repository<Card, CreateCardInput> {
  /**
   * @param db - The Drizzle database instance to use for queries
   */
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Card | null> {
    const result = await this.db.select().from(cards).where(eq(cards.id, id)).limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Retrieves all cards of every owner. Used by maintenance sweeps; services
   * serving an owner use findByOwner.
   */
  async findAll(): Promise<Card[]> {
    const results = await this.db.select().from(cards).orderBy(asc(cards.id));
    return results.map(mapToDomain);
  }

  /**
   * Retrieves all cards belonging to an owner.
   *
   * Rows come back in storage order (by id). Ordering by due date happens
   * after parsing, since text timestamps with different offsets do not sort
   * by instant.
   */
  async findByOwner(ownerId: string): Promise<Card[]> {
    const results = await this.db
      .select()
      .from(cards)
      .where(eq(cards.ownerId, ownerId))
      .orderBy(asc(cards.id));

    return results.map(mapToDomain);
  }

  /**
   * Creates a new card at version 1.
   */
  async create(input: CreateCardInput): Promise<Card> {
    const result = await this.db
      .insert(cards)
      .values({
        id: input.id,
        ownerId: input.ownerId,
        question: input.question,
        answer: input.answer,
        ...scheduleColumns(input.schedule),
        version: 1,
      })
      .returning();

    return mapToDomain(result[0]);
  }

  /**
   * Updates question and/or answer.
   *
   * @param expectedVersion - When given, the write only applies at this version
   * @throws AppError (NOT_FOUND) if the card does not exist
   * @throws AppError (CONFLICT) if the version no longer matches
   */
  async updateContent(
    id: string,
    input: UpdateCardContentInput,
    updatedAt: Timestamp,
    expectedVersion?: number
  ): Promise<Card> {
    const result = await this.db
      .update(cards)
      .set({
        ...input,
        updatedAt: formatTimestamp(updatedAt),
        version: sql`${cards.version} + 1`,
      })
      .where(this.matching(id, expectedVersion))
      .returning();

    if (result.length === 0) {
      throw await this.missOrConflict(id, expectedVersion);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Persists a card's scheduling state (read-modify-write with an optimistic
   * version check).
   *
   * @param expectedVersion - Version the schedule was computed from
   * @throws AppError (NOT_FOUND) if the card does not exist
   * @throws AppError (CONFLICT) if the card was written since it was read
   */
  async saveSchedule(id: string, schedule: CardSchedule, expectedVersion: number): Promise<Card> {
    const result = await this.db
      .update(cards)
      .set({
        ...scheduleColumns(schedule),
        version: sql`${cards.version} + 1`,
      })
      .where(this.matching(id, expectedVersion))
      .returning();

    if (result.length === 0) {
      throw await this.missOrConflict(id, expectedVersion);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Permanently deletes a card.
   *
   * @throws AppError (NOT_FOUND) if the card does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(cards)
      .where(eq(cards.id, id))
      .returning({ id: cards.id });

    if (result.length === 0) {
      throw notFoundError('Card', id);
    }
  }

  private matching(id: string, expectedVersion?: number) {
    return expectedVersion === undefined
      ? eq(cards.id, id)
      : and(eq(cards.id, id), eq(cards.version, expectedVersion));
  }

  /**
   * Explains why a guarded write touched no row.
   */
  private async missOrConflict(id: string, expectedVersion?: number): Promise<AppError> {
    const existing = await this.db
      .select({ id: cards.id })
      .from(cards)
      .where(eq(cards.id, id))
      .limit(1);

    if (existing.length === 0 || expectedVersion === undefined) {
      return notFoundError('Card', id);
    }
    return conflictError('Card', id, expectedVersion);
  }
}
