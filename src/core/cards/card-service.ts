/**
 * CardService - Owner-Scoped Card Operations
 *
 * Orchestrates storage, consistency repair and the review scheduler for one
 * owner's cards. Every operation checks ownership first: an unknown id is
 * NOT_FOUND, a card of another owner is FORBIDDEN, and neither reaches the
 * scheduler.
 *
 * Reads run consistency repair and persist the result when a fix was applied,
 * so scheduling always starts from state that satisfies the invariants.
 * Writes are read-modify-write cycles guarded by the card's version: a review
 * computed from a stale read fails with CONFLICT instead of overwriting a
 * concurrent one.
 *
 * @example
 * ```typescript
 * const service = new CardService({
 *   cardRepo: new CardRepository(db),
 *   ruleService: new RuleService({ ruleRepo: new IntervalRuleRepository(db) }),
 *   scheduler: new ReviewScheduler({ defaultOffsetMinutes: 0 }),
 * });
 *
 * const card = await service.createCard('user_42', { question: 'Q?', answer: 'A.' });
 * const { transition } = await service.reviewCard('user_42', card.id, 'remembered');
 * ```
 */

import { randomUUID } from 'crypto';
import { forbiddenError, isAppError, ErrorCodes, notFoundError } from '../errors';
import type { Card, RepairedCard, ReviewOutcome } from '../models';
import { describeFix, type ReviewScheduler, type ReviewTransition } from '../scheduling';
import type { RuleService } from '../rules';
import { compareInstants, formatTimestamp, parseTimestamp, type Timestamp } from '../time';
import { parseInput } from '../validation';
import { createLogger, type Logger } from '@/logger';
import type { CardRepository } from '@/storage/repositories';
import { createCardSchema, dueScopeSchema, updateCardSchema, type DueScope } from './commands';

/**
 * Dependencies required by the CardService.
 */
export interface CardServiceDependencies {
  /** Repository for card persistence */
  cardRepo: CardRepository;
  /** Source of each owner's interval table */
  ruleService: RuleService;
  /** Scheduler bound to the deployment offset and clock */
  scheduler: ReviewScheduler;
  /** Logger (defaults to a '[Cards]' console logger) */
  logger?: Logger;
  /** Id generator (defaults to 'card_' + a random UUID) */
  generateId?: () => string;
}

/**
 * Outcome of a review: the stored card and how its schedule was derived.
 */
export interface ReviewResult {
  card: RepairedCard;
  transition: ReviewTransition;
}

/**
 * Counts from a repair sweep.
 */
export interface RepairSummary {
  /** Cards examined */
  scanned: number;
  /** Cards that needed at least one fix */
  repaired: number;
}

export interface ListDueOptions {
  /** 'now' (default) or 'today' */
  scope?: DueScope;
  /** Reference instant (defaults to the scheduler's clock) */
  asOf?: Date;
}

// A repair write that loses a version race is retried against a fresh read
const MAX_REPAIR_ATTEMPTS = 2;

function byCreation(a: RepairedCard, b: RepairedCard): number {
  return compareInstants(a.schedule.createdAt, b.schedule.createdAt) || a.id.localeCompare(b.id);
}

function byDueDate(a: RepairedCard, b: RepairedCard): number {
  return compareInstants(a.schedule.nextDueAt, b.schedule.nextDueAt) || a.id.localeCompare(b.id);
}

export class CardService {
  private readonly cardRepo: CardRepository;
  private readonly ruleService: RuleService;
  private readonly scheduler: ReviewScheduler;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(deps: CardServiceDependencies) {
    this.cardRepo = deps.cardRepo;
    this.ruleService = deps.ruleService;
    this.scheduler = deps.scheduler;
    this.logger = deps.logger ?? createLogger('[Cards]');
    this.generateId = deps.generateId ?? (() => `card_${randomUUID()}`);
  }

  /**
   * Creates a card that is due immediately.
   *
   * @param input - `{ question, answer }` (validated here)
   * @throws AppError (VALIDATION_ERROR) for missing or over-long content
   */
  async createCard(ownerId: string, input: unknown): Promise<RepairedCard> {
    const command = parseInput(createCardSchema, input, 'Invalid card');
    const schedule = this.scheduler.createInitialSchedule();

    const card = await this.cardRepo.create({
      id: this.generateId(),
      ownerId,
      question: command.question,
      answer: command.answer,
      schedule,
    });

    this.logger.debug(`created ${card.id} for owner '${ownerId}'`);
    return { ...card, schedule };
  }

  /**
   * One card, repaired.
   *
   * @throws AppError (NOT_FOUND | FORBIDDEN)
   */
  async getCard(ownerId: string, id: string): Promise<RepairedCard> {
    const card = await this.loadOwned(ownerId, id);
    const { card: repaired } = await this.repairCard(card);
    return repaired;
  }

  /**
   * All of the owner's cards, repaired, oldest first.
   */
  async listCards(ownerId: string): Promise<RepairedCard[]> {
    const cards = await this.cardRepo.findByOwner(ownerId);
    const repaired: RepairedCard[] = [];
    for (const card of cards) {
      const result = await this.repairCard(card);
      repaired.push(result.card);
    }
    return repaired.sort(byCreation);
  }

  /**
   * The owner's due cards, earliest due first.
   *
   * Filtering happens after repair because stored text timestamps with
   * different offsets do not order by instant.
   */
  async listDueCards(ownerId: string, options: ListDueOptions = {}): Promise<RepairedCard[]> {
    const scope = parseInput(dueScopeSchema, options.scope ?? 'now', 'Invalid due scope');
    const cards = await this.listCards(ownerId);

    const due = cards.filter((card) =>
      scope === 'today'
        ? this.scheduler.isDueToday(card.schedule, options.asOf)
        : this.scheduler.isDue(card.schedule, options.asOf)
    );
    return due.sort(byDueDate);
  }

  /**
   * Records a review and persists the new schedule.
   *
   * @throws AppError (NOT_FOUND | FORBIDDEN)
   * @throws AppError (CONFLICT) when the card changed between read and write
   */
  async reviewCard(ownerId: string, id: string, outcome: ReviewOutcome): Promise<ReviewResult> {
    const card = await this.getCard(ownerId, id);
    const table = await this.ruleService.getTable(ownerId);

    const transition = this.scheduler.review(card.schedule, outcome, table);
    const saved = await this.saveGuarded(card, () =>
      this.cardRepo.saveSchedule(card.id, transition.schedule, card.version)
    );

    this.logger.debug(
      `reviewed ${card.id}: ${outcome}, repetition ${transition.schedule.repetitionCount}, ` +
        `next due ${formatTimestamp(transition.schedule.nextDueAt)}` +
        (transition.lateReview ? ' (late)' : '')
    );

    return { card: { ...saved, schedule: transition.schedule }, transition };
  }

  /**
   * Edits question and/or answer. Scheduling state is untouched.
   *
   * @param input - A CardUpdateCommand (validated here; unknown keys are rejected)
   * @throws AppError (VALIDATION_ERROR | NOT_FOUND | FORBIDDEN | CONFLICT)
   */
  async updateCard(ownerId: string, id: string, input: unknown): Promise<RepairedCard> {
    const command = parseInput(updateCardSchema, input, 'Invalid card update');
    const card = await this.loadOwned(ownerId, id);

    const saved = await this.saveGuarded(card, () =>
      this.cardRepo.updateContent(id, command, this.scheduler.normalizer.now(), card.version)
    );
    const { card: repaired } = await this.repairCard(saved);
    return repaired;
  }

  /**
   * Moves a card's due date. A timestamp without an offset is read in the
   * default offset. The repetition count and streak are kept.
   *
   * @param nextDueAt - New due date, as a Timestamp or ISO-8601 text
   * @throws AppError (INVALID_TIMESTAMP) for unreadable text
   */
  async rescheduleCard(
    ownerId: string,
    id: string,
    nextDueAt: Timestamp | string
  ): Promise<RepairedCard> {
    const requested = typeof nextDueAt === 'string' ? parseTimestamp(nextDueAt) : nextDueAt;
    const card = await this.getCard(ownerId, id);

    const schedule = {
      ...card.schedule,
      nextDueAt: this.scheduler.normalizer.normalize(requested),
      updatedAt: this.scheduler.normalizer.now(),
    };
    const saved = await this.saveGuarded(card, () =>
      this.cardRepo.saveSchedule(card.id, schedule, card.version)
    );

    this.logger.debug(`rescheduled ${card.id} to ${formatTimestamp(schedule.nextDueAt)}`);
    return { ...saved, schedule };
  }

  /**
   * @throws AppError (NOT_FOUND | FORBIDDEN)
   */
  async deleteCard(ownerId: string, id: string): Promise<void> {
    await this.loadOwned(ownerId, id);
    await this.cardRepo.delete(id);
    this.logger.debug(`deleted ${id}`);
  }

  /**
   * Repairs and persists every card of the owner.
   */
  async repairAll(ownerId: string): Promise<RepairSummary> {
    const cards = await this.cardRepo.findByOwner(ownerId);
    let repaired = 0;
    for (const card of cards) {
      const result = await this.repairCard(card);
      if (result.repaired) {
        repaired++;
      }
    }
    return { scanned: cards.length, repaired };
  }

  private async loadOwned(ownerId: string, id: string): Promise<Card> {
    const card = await this.cardRepo.findById(id);
    if (!card) {
      throw notFoundError('Card', id);
    }
    if (card.ownerId !== ownerId) {
      throw forbiddenError('Card', id, ownerId);
    }
    return card;
  }

  /**
   * Runs consistency repair and persists the result when anything changed.
   */
  private async repairCard(
    card: Card,
    attempt: number = 1
  ): Promise<{ card: RepairedCard; repaired: boolean }> {
    const result = this.scheduler.repair(card.schedule);
    if (!result.repaired) {
      return { card: { ...card, schedule: result.schedule }, repaired: false };
    }

    this.logger.warn(`repaired ${card.id} (${result.fixes.map(describeFix).join(', ')})`);

    try {
      const saved = await this.cardRepo.saveSchedule(card.id, result.schedule, card.version);
      return { card: { ...saved, schedule: result.schedule }, repaired: true };
    } catch (error) {
      if (!isAppError(error, ErrorCodes.CONFLICT) || attempt >= MAX_REPAIR_ATTEMPTS) {
        throw error;
      }
      this.logger.warn(`conflict persisting repair of ${card.id}; re-reading`);
      const fresh = await this.cardRepo.findById(card.id);
      if (!fresh) {
        throw notFoundError('Card', card.id);
      }
      return this.repairCard(fresh, attempt + 1);
    }
  }

  /**
   * Runs a version-guarded write, logging lost races before rethrowing.
   */
  private async saveGuarded(card: Card, write: () => Promise<Card>): Promise<Card> {
    try {
      return await write();
    } catch (error) {
      if (isAppError(error, ErrorCodes.CONFLICT)) {
        this.logger.warn(`conflict writing ${card.id} at version ${card.version}`);
      }
      throw error;
    }
  }
}
