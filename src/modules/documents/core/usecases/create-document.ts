import { err, type Result } from 'neverthrow';

import { validateDocumentInput } from '../validation.js';

import type { DocumentsError } from '../errors.js';
import type { DocumentsRepository } from '../ports.js';
import type { CreateDocumentInput, LedgerDocument } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface CreateDocumentDeps {
  documentsRepo: DocumentsRepository;
  cacheInvalidator: CacheInvalidator;
}

/**
 * Stores a document with its alert settings.
 * Invalidates document, deadline and dashboard reads.
 */
export async function createDocument(
  deps: CreateDocumentDeps,
  input: CreateDocumentInput
): Promise<Result<LedgerDocument, DocumentsError>> {
  const fields = validateDocumentInput(input);
  if (fields.isErr()) {
    return err(fields.error);
  }

  const result = await deps.documentsRepo.create(fields.value);
  if (result.isOk()) {
    await deps.cacheInvalidator.invalidate('document');
  }
  return result;
}
