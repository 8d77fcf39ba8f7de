/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the scheduling core, the services
 * and storage, and have no runtime dependencies beyond a few constants.
 *
 * @example
 * ```typescript
 * import type { Card, CardSchedule, IntervalRule } from '@/core/models';
 * ```
 */

export {
  SCHEDULE_TIMESTAMP_FIELDS,
  type Card,
  type CardSchedule,
  type NormalizedSchedule,
  type RepairedCard,
  type ReviewOutcome,
  type ScheduleStage,
  type ScheduleTimestampField,
} from './card';

export type { IntervalRule, IntervalUpdate } from './interval-rule';
