/**
 * People Module - Domain Errors
 */

import {
  createDatabaseError,
  createValidationError,
  type DatabaseError,
  type ValidationError,
} from '../../../common/errors.js';

export { createDatabaseError, createValidationError };
export type { DatabaseError, ValidationError };

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface PersonNotFoundError {
  readonly type: 'PersonNotFoundError';
  readonly message: string;
  readonly id: string;
}

/**
 * Another person already holds the tax id.
 */
export interface PersonConflictError {
  readonly type: 'PersonConflictError';
  readonly message: string;
  readonly taxId: string;
}

/**
 * The person is the only owner of one or more documents.
 */
export interface PersonInUseError {
  readonly type: 'PersonInUseError';
  readonly message: string;
  readonly id: string;
  readonly documentCount: number;
}

export type PeopleError =
  | DatabaseError
  | ValidationError
  | PersonNotFoundError
  | PersonConflictError
  | PersonInUseError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createPersonNotFoundError = (id: string): PersonNotFoundError => ({
  type: 'PersonNotFoundError',
  message: `Person with ID '${id}' not found`,
  id,
});

export const createPersonConflictError = (taxId: string): PersonConflictError => ({
  type: 'PersonConflictError',
  message: `A person with tax id '${taxId}' already exists`,
  taxId,
});

export const createPersonInUseError = (
  id: string,
  documentCount: number
): PersonInUseError => ({
  type: 'PersonInUseError',
  message: `Person with ID '${id}' owns ${String(documentCount)} document(s) without a farm`,
  id,
  documentCount,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const PEOPLE_ERROR_HTTP_STATUS: Record<PeopleError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
  PersonNotFoundError: 404,
  PersonConflictError: 409,
  PersonInUseError: 409,
};

export const getHttpStatusForError = (error: PeopleError): number => {
  return PEOPLE_ERROR_HTTP_STATUS[error.type];
};
