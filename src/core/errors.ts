/**
 * Application Errors
 *
 * Every controlled failure in Cadence is an AppError carrying a
 * machine-readable code. Callers (the CLI, or any outer surface built on the
 * services) switch on `code` instead of parsing messages.
 *
 * Scheduling itself never raises for configuration or data-quality defects:
 * rule-table gaps fall back to a default interval and malformed persisted
 * state goes through the consistency repairer. Errors here cover caller
 * misuse, ownership violations and storage-level problems.
 *
 * @example
 * ```typescript
 * const card = await cardRepo.findById(id);
 * if (!card) {
 *   throw notFoundError('Card', id);
 * }
 * ```
 */

/**
 * Standard error codes used throughout the application.
 */
export const ErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  FORBIDDEN: 'FORBIDDEN',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT: 'CONFLICT',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  DATA_CORRUPTION: 'DATA_CORRUPTION',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom application error class for throwing controlled errors.
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

/**
 * Type guard for AppError, optionally narrowed to a specific code.
 */
export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}

/**
 * Creates a not found error for a resource.
 *
 * @param resource - Name of the resource type (e.g., 'Card')
 * @param id - The ID that was not found
 */
export function notFoundError(resource: string, id: string): AppError {
  return new AppError(
    ErrorCodes.NOT_FOUND,
    `${resource} with ID '${id}' not found`,
    { resource, id }
  );
}

/**
 * Creates an error for an operation on a resource owned by someone else.
 * Raised before any scheduling logic runs.
 */
export function forbiddenError(resource: string, id: string, ownerId: string): AppError {
  return new AppError(
    ErrorCodes.FORBIDDEN,
    `${resource} '${id}' does not belong to owner '${ownerId}'`,
    { resource, id, ownerId }
  );
}

/**
 * Creates a validation error.
 *
 * @example
 * ```typescript
 * const result = schema.safeParse(input);
 * if (!result.success) {
 *   throw validationError('Invalid card content', result.error.issues);
 * }
 * ```
 */
export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, details);
}

/**
 * Creates an error for a write that lost an optimistic concurrency check.
 */
export function conflictError(resource: string, id: string, expectedVersion: number): AppError {
  return new AppError(
    ErrorCodes.CONFLICT,
    `${resource} '${id}' was modified concurrently (expected version ${expectedVersion})`,
    { resource, id, expectedVersion }
  );
}

/**
 * Creates an error for a programming-contract violation, such as running a
 * review transition on state that skipped consistency repair.
 */
export function preconditionError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.PRECONDITION_FAILED, message, details);
}

/**
 * Creates an error for text that cannot be read as a timestamp or offset.
 */
export function timestampError(input: string, reason: string): AppError {
  return new AppError(
    ErrorCodes.INVALID_TIMESTAMP,
    `Invalid timestamp '${input}': ${reason}`,
    { input, reason }
  );
}
