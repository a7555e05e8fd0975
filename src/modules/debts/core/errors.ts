/**
 * Debts Module - Domain Errors
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

export interface DebtNotFoundError {
  readonly type: 'DebtNotFoundError';
  readonly message: string;
  readonly id: string;
}

export interface InstallmentNotFoundError {
  readonly type: 'InstallmentNotFoundError';
  readonly message: string;
  readonly debtId: string;
  readonly installmentId: string;
}

export interface InstallmentAlreadyPaidError {
  readonly type: 'InstallmentAlreadyPaidError';
  readonly message: string;
  readonly installmentId: string;
}

export type DebtsError =
  | DatabaseError
  | ValidationError
  | DebtNotFoundError
  | InstallmentNotFoundError
  | InstallmentAlreadyPaidError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDebtNotFoundError = (id: string): DebtNotFoundError => ({
  type: 'DebtNotFoundError',
  message: `Debt with ID '${id}' not found`,
  id,
});

export const createInstallmentNotFoundError = (
  debtId: string,
  installmentId: string
): InstallmentNotFoundError => ({
  type: 'InstallmentNotFoundError',
  message: `Installment '${installmentId}' not found for debt '${debtId}'`,
  debtId,
  installmentId,
});

export const createInstallmentAlreadyPaidError = (
  installmentId: string
): InstallmentAlreadyPaidError => ({
  type: 'InstallmentAlreadyPaidError',
  message: `Installment '${installmentId}' is already paid`,
  installmentId,
});

export const createMissingReferenceError = (): ValidationError =>
  createValidationError('Referenced person or farm does not exist');

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const DEBTS_ERROR_HTTP_STATUS: Record<DebtsError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
  DebtNotFoundError: 404,
  InstallmentNotFoundError: 404,
  InstallmentAlreadyPaidError: 409,
};

export const getHttpStatusForError = (error: DebtsError): number => {
  return DEBTS_ERROR_HTTP_STATUS[error.type];
};
