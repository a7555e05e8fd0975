import type { DocumentsError } from './errors.js';
import type { DocumentFields, DocumentListFilter, LedgerDocument } from './types.js';
import type { OffsetPage } from '../../../common/constants/pagination.js';
import type { Result } from 'neverthrow';

export interface DocumentsRepository {
  /** A missing farm or person fails with a ValidationError */
  create(fields: DocumentFields): Promise<Result<LedgerDocument, DocumentsError>>;

  findById(id: string): Promise<Result<LedgerDocument | null, DocumentsError>>;

  /** Ordered by expiry (never-expiring last), then name */
  list(filter: DocumentListFilter): Promise<Result<OffsetPage<LedgerDocument>, DocumentsError>>;

  update(
    id: string,
    fields: DocumentFields
  ): Promise<Result<LedgerDocument | null, DocumentsError>>;

  delete(id: string): Promise<Result<boolean, DocumentsError>>;
}
