/**
 * Zod Input Validation
 *
 * Services validate caller input with zod schemas and report failures as
 * VALIDATION_ERROR AppErrors, with one `{ path, message }` detail per issue.
 *
 * @example
 * ```typescript
 * const command = parseInput(createCardSchema, input, 'Invalid card');
 * // throws AppError: "Invalid card: question: Question is required"
 * ```
 */

import type { z } from 'zod';
import { validationError } from './errors';

/**
 * One field-level validation failure.
 */
export interface ValidationErrorDetail {
  /** Dot-separated path of the offending field, empty for the input itself */
  path: string;
  message: string;
}

/**
 * Parses `input` with `schema`, throwing a VALIDATION_ERROR on failure.
 *
 * @param summary - Message prefix, e.g. 'Invalid card'
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  summary: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const details: ValidationErrorDetail[] = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const description = details
    .map((detail) => (detail.path ? `${detail.path}: ${detail.message}` : detail.message))
    .join('; ');

  throw validationError(`${summary}: ${description}`, details);
}
