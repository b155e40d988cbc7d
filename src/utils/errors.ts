/**
 * Error Handling Utilities
 *
 * Typed application errors for the stock ledger. Key-level failures of the
 * reconciliation engine are raised as these classes; row-level conditions
 * (duplicates, insufficient stock, invalid rows) are returned as data and
 * never appear here.
 */

import { logger } from './logger.js';

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.resource = resource;
  }
}

/**
 * The (employee, date) lock could not be taken within the configured wait.
 * Nothing was changed; the caller may try again.
 */
export class LockTimeoutError extends AppError {
  constructor(public readonly lockKey: string, public readonly waitedMs: number) {
    super(
      `Timed out after ${waitedMs}ms waiting for lock ${lockKey}`,
      'LOCK_TIMEOUT',
      503
    );
  }
}

/**
 * The lock expired and was taken over before this holder committed.
 * The holder's transaction is rolled back.
 */
export class LockLostError extends AppError {
  constructor(public readonly lockKey: string) {
    super(`Lock ${lockKey} is no longer held by this owner`, 'LOCK_LOST', 409);
  }
}

/**
 * Journal and ledger disagree for a key. This is a data-integrity alarm,
 * not a retryable condition.
 */
export class RevertFailureError extends AppError {
  constructor(message: string, public readonly lockKey: string, options?: { cause?: unknown }) {
    super(message, 'REVERT_FAILURE', 500, false, options);
  }
}

/**
 * Unexpected storage failure during a reconciliation transaction.
 * The transaction has been rolled back in full.
 */
export class PersistenceFailureError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERSISTENCE_FAILURE', 500, true, options);
  }
}

/**
 * A stock movement would drive a counter below zero.
 */
export class InsufficientStockError extends AppError {
  constructor(
    public readonly employeeId: string,
    public readonly counter: string,
    public readonly available: number,
    public readonly requested: number
  ) {
    super(
      `Insufficient ${counter} for ${employeeId}: requested ${requested}, available ${available}`,
      'INSUFFICIENT_STOCK',
      409
    );
  }
}

/**
 * Check if an error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof LockTimeoutError || error instanceof LockLostError) {
    return true;
  }

  if (
    error instanceof Error &&
    (error.message.includes('SQLITE_BUSY') || error.message.includes('database is locked'))
  ) {
    return true;
  }

  return false;
}

/**
 * Format error for user-facing response (no internal details)
 */
export function formatUserError(error: unknown): { error: string; code?: string } {
  if (error instanceof AppError && error.isOperational) {
    return {
      error: error.message,
      code: error.code,
    };
  }

  // Don't expose internal error details
  return {
    error: 'An unexpected error occurred',
    code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
  };
}

/**
 * Log error without exposing sensitive data
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const safeContext = { ...context };
  const sensitiveFields = ['token', 'botToken', 'contactNumber', 'contact_number'];

  for (const field of sensitiveFields) {
    if (field in safeContext) {
      safeContext[field] = '[REDACTED]';
    }
  }

  if (error instanceof AppError) {
    const level = error.isOperational ? 'error' : 'fatal';
    logger[level](
      {
        ...safeContext,
        errorCode: error.code,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        message: error.message,
      },
      'Application error'
    );
  } else if (error instanceof Error) {
    logger.error(
      {
        ...safeContext,
        message: error.message,
        name: error.name,
      },
      'Unexpected error'
    );
  } else {
    logger.error(
      {
        ...safeContext,
        error: String(error),
      },
      'Unknown error'
    );
  }
}
