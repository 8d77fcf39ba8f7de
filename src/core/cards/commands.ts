/**
 * Card Command Schemas (Zod)
 *
 * Explicit, enumerated commands for the card service. An update command
 * carries only the fields a learner may change; anything else, including
 * scheduling state, is rejected rather than silently copied onto the card.
 */

import { z } from 'zod';

const questionSchema = z
  .string()
  .trim()
  .min(1, 'Question is required')
  .max(100, 'Question must be 100 characters or less');

const answerSchema = z
  .string()
  .trim()
  .min(1, 'Answer is required')
  .max(500, 'Answer must be 500 characters or less');

/**
 * Schema for creating a card.
 *
 * Validates:
 * - question: 1-100 characters after trimming
 * - answer: 1-500 characters after trimming
 *
 * @example
 * ```typescript
 * const result = createCardSchema.safeParse({
 *   question: 'Boiling point of water at sea level?',
 *   answer: '100 °C',
 * });
 * ```
 */
export const createCardSchema = z
  .object({
    question: questionSchema,
    answer: answerSchema,
  })
  .strict();

/** TypeScript type inferred from createCardSchema */
export type CreateCardCommand = z.infer<typeof createCardSchema>;

/**
 * Schema for editing a card's content. At least one field is required.
 */
export const updateCardSchema = z
  .object({
    question: questionSchema.optional(),
    answer: answerSchema.optional(),
  })
  .strict()
  .refine((command) => command.question !== undefined || command.answer !== undefined, {
    message: 'Provide a question or an answer to change',
  });

/** TypeScript type inferred from updateCardSchema */
export type CardUpdateCommand = z.infer<typeof updateCardSchema>;

/**
 * Which due cards to list: due at this instant, or due before the end of the
 * current civil day in the default offset.
 */
export const dueScopeSchema = z.enum(['now', 'today']);

export type DueScope = z.infer<typeof dueScopeSchema>;
