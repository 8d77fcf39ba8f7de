/**
 * Repository Layer - Barrel Export
 *
 * Each repository takes a Drizzle database instance and maps between rows
 * and domain models.
 *
 * @example
 * ```typescript
 * import { CardRepository, IntervalRuleRepository } from '@/storage/repositories';
 *
 * const cardRepo = new CardRepository(db);
 * const ruleRepo = new IntervalRuleRepository(db);
 * ```
 */

// Base repository interface
export type { Repository } from './base';

export {
  CardRepository,
  type CreateCardInput,
  type UpdateCardContentInput,
} from './card.repository';

export { IntervalRuleRepository } from './interval-rule.repository';
