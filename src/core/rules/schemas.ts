/**
 * Interval Rule Schemas (Zod)
 *
 * Validates rule tables and per-row interval edits before they reach
 * storage. Structural checks live here; cross-rule checks (overlaps, gaps)
 * need the whole table and are done by the rule service.
 */

import { z } from 'zod';

/**
 * Schema for one interval rule.
 *
 * Validates:
 * - minRepetition: integer, at least 1
 * - maxRepetition: integer, at least minRepetition
 * - intervalDays: integer, at least 0
 */
export const intervalRuleSchema = z
  .object({
    minRepetition: z.number().int('minRepetition must be an integer').min(1, 'minRepetition must be at least 1'),
    maxRepetition: z.number().int('maxRepetition must be an integer').min(1, 'maxRepetition must be at least 1'),
    intervalDays: z.number().int('intervalDays must be an integer').min(0, 'intervalDays must not be negative'),
  })
  .strict()
  .refine((rule) => rule.maxRepetition >= rule.minRepetition, {
    message: 'maxRepetition must not be less than minRepetition',
    path: ['maxRepetition'],
  });

/**
 * Schema for a complete rule table. An empty table is rejected: resolution
 * would still work (everything falls back) but an owner never means it.
 */
export const intervalRuleListSchema = z
  .array(intervalRuleSchema)
  .min(1, 'At least one interval rule is required');

/**
 * Schema for an edit of one repetition's interval.
 */
export const intervalUpdateSchema = z
  .object({
    repetition: z.number().int('repetition must be an integer').min(1, 'repetition must be at least 1'),
    intervalDays: z.number().int('intervalDays must be an integer').min(0, 'intervalDays must not be negative'),
  })
  .strict();

export const intervalUpdateListSchema = z
  .array(intervalUpdateSchema)
  .min(1, 'At least one interval update is required');
