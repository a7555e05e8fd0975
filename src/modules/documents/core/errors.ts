/**
 * Documents Module - Domain Errors
 */

import {
  createDatabaseError,
  createValidationError,
  type DatabaseError,
  type ValidationError,
} from '../../../common/errors.js';

export { createDatabaseError, createValidationError };
export type { DatabaseError, ValidationError };

export interface DocumentNotFoundError {
  readonly type: 'DocumentNotFoundError';
  readonly message: string;
  readonly id: string;
}

export type DocumentsError = DatabaseError | ValidationError | DocumentNotFoundError;

export const createDocumentNotFoundError = (id: string): DocumentNotFoundError => ({
  type: 'DocumentNotFoundError',
  message: `Document with ID '${id}' not found`,
  id,
});

/**
 * The referenced farm or person is missing (foreign key violation).
 */
export const createMissingReferenceError = (): ValidationError =>
  createValidationError('Referenced farm or person does not exist');

export const DOCUMENTS_ERROR_HTTP_STATUS: Record<DocumentsError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
  DocumentNotFoundError: 404,
};

export const getHttpStatusForError = (error: DocumentsError): number => {
  return DOCUMENTS_ERROR_HTTP_STATUS[error.type];
};
