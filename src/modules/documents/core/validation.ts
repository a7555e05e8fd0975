/**
 * Documents Module - Input Validation
 */

import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import {
  isDocumentKind,
  MAX_ALERT_THRESHOLD_DAYS,
  type CreateDocumentInput,
  type DocumentFields,
} from './types.js';
import { isIsoDate } from '../../../common/dates.js';
import { normalizeRecipients } from '../../../common/recipients.js';

const optionalText = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
};

/**
 * Deduplicates custom offsets and sorts them descending.
 * An empty list falls back to the default set.
 */
export const normalizeAlertThresholds = (
  thresholds: readonly number[] | null | undefined
): Result<number[] | null, ValidationError> => {
  if (thresholds === null || thresholds === undefined || thresholds.length === 0) {
    return ok(null);
  }

  for (const days of thresholds) {
    if (!Number.isInteger(days) || days < 1 || days > MAX_ALERT_THRESHOLD_DAYS) {
      return err(
        createValidationError(
          `Alert thresholds must be whole days between 1 and ${String(MAX_ALERT_THRESHOLD_DAYS)}`,
          'alertThresholds'
        )
      );
    }
  }

  return ok([...new Set(thresholds)].sort((a, b) => b - a));
};

export const validateDocumentInput = (
  input: CreateDocumentInput
): Result<DocumentFields, ValidationError> => {
  const name = input.name.trim();
  if (name === '') {
    return err(createValidationError('name is required', 'name'));
  }

  if (!isDocumentKind(input.kind)) {
    return err(createValidationError(`Unknown document kind '${input.kind}'`, 'kind'));
  }
  const kind = input.kind;

  const customKind = optionalText(input.customKind);
  if (kind === 'other' && customKind === null) {
    return err(createValidationError('customKind is required for kind "other"', 'customKind'));
  }

  if (!isIsoDate(input.issuedOn)) {
    return err(createValidationError('issuedOn must be a valid date', 'issuedOn'));
  }

  const expiresOn = input.expiresOn ?? null;
  if (expiresOn !== null && !isIsoDate(expiresOn)) {
    return err(createValidationError('expiresOn must be a valid date', 'expiresOn'));
  }

  const farmId = input.farmId ?? null;
  const personId = input.personId ?? null;
  if (farmId === null && personId === null) {
    return err(createValidationError('A document needs a farm or a responsible person', 'farmId'));
  }

  const thresholds = normalizeAlertThresholds(input.alertThresholds);
  if (thresholds.isErr()) return err(thresholds.error);

  return ok({
    name,
    kind,
    customKind: kind === 'other' ? customKind : null,
    issuedOn: input.issuedOn,
    expiresOn,
    farmId,
    personId,
    alertEmails: normalizeRecipients(input.alertEmails ?? []),
    alertThresholds: thresholds.value,
    alertsEnabled: input.alertsEnabled ?? true,
  });
};
