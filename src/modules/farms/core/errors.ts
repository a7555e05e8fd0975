/**
 * Farms Module - Domain Errors
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

export interface FarmNotFoundError {
  readonly type: 'FarmNotFoundError';
  readonly message: string;
  readonly id: string;
}

/**
 * The registration number is already used by another farm.
 */
export interface FarmConflictError {
  readonly type: 'FarmConflictError';
  readonly message: string;
  readonly registrationNumber: string;
}

/**
 * Person referenced by a farm link does not exist.
 */
export interface LinkedPersonNotFoundError {
  readonly type: 'LinkedPersonNotFoundError';
  readonly message: string;
  readonly personId: string;
}

export interface FarmLinkNotFoundError {
  readonly type: 'FarmLinkNotFoundError';
  readonly message: string;
  readonly farmId: string;
  readonly personId: string;
}

export type FarmsError =
  | DatabaseError
  | ValidationError
  | FarmNotFoundError
  | FarmConflictError
  | LinkedPersonNotFoundError
  | FarmLinkNotFoundError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createFarmNotFoundError = (id: string): FarmNotFoundError => ({
  type: 'FarmNotFoundError',
  message: `Farm with ID '${id}' not found`,
  id,
});

export const createFarmConflictError = (registrationNumber: string): FarmConflictError => ({
  type: 'FarmConflictError',
  message: `A farm with registration number '${registrationNumber}' already exists`,
  registrationNumber,
});

export const createLinkedPersonNotFoundError = (personId: string): LinkedPersonNotFoundError => ({
  type: 'LinkedPersonNotFoundError',
  message: `Person with ID '${personId}' not found`,
  personId,
});

export const createFarmLinkNotFoundError = (
  farmId: string,
  personId: string
): FarmLinkNotFoundError => ({
  type: 'FarmLinkNotFoundError',
  message: `Person '${personId}' is not linked to farm '${farmId}'`,
  farmId,
  personId,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const FARMS_ERROR_HTTP_STATUS: Record<FarmsError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
  FarmNotFoundError: 404,
  FarmConflictError: 409,
  LinkedPersonNotFoundError: 404,
  FarmLinkNotFoundError: 404,
};

export const getHttpStatusForError = (error: FarmsError): number => {
  return FARMS_ERROR_HTTP_STATUS[error.type];
};
