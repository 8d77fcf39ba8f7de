/**
 * Cards Module - Barrel Export
 */

export {
  CardService,
  type CardServiceDependencies,
  type ListDueOptions,
  type RepairSummary,
  type ReviewResult,
} from './card-service';

export {
  createCardSchema,
  dueScopeSchema,
  updateCardSchema,
  type CardUpdateCommand,
  type CreateCardCommand,
  type DueScope,
} from './commands';
