/**
 * Errors shared by every module.
 *
 * Module error unions extend these with their own discriminated members.
 */

/**
 * Database-related error.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * Input failed a business rule (bad tax id, unknown referenced record, ...).
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field?: string;
}

export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createValidationError = (message: string, field?: string): ValidationError => ({
  type: 'ValidationError',
  message,
  ...(field !== undefined && { field }),
});

/**
 * PostgreSQL unique_violation, raised by duplicate inserts and updates.
 */
export const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';

/**
 * PostgreSQL foreign_key_violation, raised when a referenced row is missing.
 */
export const isForeignKeyViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === '23503';
