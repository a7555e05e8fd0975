/**
 * Deadline Alerts Module - Domain Errors
 */

import {
  createDatabaseError,
  createValidationError,
  type DatabaseError,
  type ValidationError,
} from '../../../common/errors.js';

import type { ObligationKind } from './types.js';

export { createDatabaseError, createValidationError };
export type { DatabaseError, ValidationError };

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface ObligationNotFoundError {
  readonly type: 'ObligationNotFoundError';
  readonly message: string;
  readonly kind: ObligationKind;
  readonly obligationId: string;
}

/**
 * Template rendering failed; recorded on the alert, never returned by a route.
 */
export interface RenderError {
  readonly type: 'RenderError';
  readonly message: string;
}

export type DeadlineAlertsError = DatabaseError | ValidationError | ObligationNotFoundError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createObligationNotFoundError = (
  kind: ObligationKind,
  obligationId: string
): ObligationNotFoundError => ({
  type: 'ObligationNotFoundError',
  message: `No ${kind} with ID '${obligationId}'`,
  kind,
  obligationId,
});

export const createRenderError = (message: string): RenderError => ({
  type: 'RenderError',
  message,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const DEADLINE_ALERTS_ERROR_HTTP_STATUS: Record<DeadlineAlertsError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
  ObligationNotFoundError: 404,
};

export const getHttpStatusForError = (error: DeadlineAlertsError): number => {
  return DEADLINE_ALERTS_ERROR_HTTP_STATUS[error.type];
};
