/**
 * List Documents Use Case
 */

import { err, type Result } from 'neverthrow';

import { normalizePagination, type OffsetPage } from '../../../../common/constants/pagination.js';
import { addDays, type IsoDate } from '../../../../common/dates.js';
import { createValidationError, type DocumentsError } from '../errors.js';

import type { DocumentsRepository } from '../ports.js';
import type { DocumentListFilter, LedgerDocument } from '../types.js';

export interface ListDocumentsDeps {
  documentsRepo: DocumentsRepository;
}

export interface ListDocumentsInput {
  farmId?: string;
  personId?: string;
  /** Only documents expiring from today up to today + n days */
  expiringWithinDays?: number;
  /** Today in the alert timezone */
  today: IsoDate;
  limit?: number;
  offset?: number;
}

export async function listDocuments(
  deps: ListDocumentsDeps,
  input: ListDocumentsInput
): Promise<Result<OffsetPage<LedgerDocument>, DocumentsError>> {
  const { farmId, personId, expiringWithinDays, today } = input;

  if (
    expiringWithinDays !== undefined &&
    (!Number.isInteger(expiringWithinDays) || expiringWithinDays < 0)
  ) {
    return err(
      createValidationError(
        'expiringWithinDays must be a non-negative integer',
        'expiringWithinDays'
      )
    );
  }

  const filter: DocumentListFilter = {
    ...normalizePagination(input),
    ...(farmId !== undefined && { farmId }),
    ...(personId !== undefined && { personId }),
    ...(expiringWithinDays !== undefined && {
      expiring: { from: today, to: addDays(today, expiringWithinDays) },
    }),
  };

  return deps.documentsRepo.list(filter);
}
