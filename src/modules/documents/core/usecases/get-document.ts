import { err, ok, type Result } from 'neverthrow';

import { createDocumentNotFoundError, type DocumentsError } from '../errors.js';

import type { DocumentsRepository } from '../ports.js';
import type { LedgerDocument } from '../types.js';

export interface GetDocumentDeps {
  documentsRepo: DocumentsRepository;
}

export async function getDocument(
  deps: GetDocumentDeps,
  input: { id: string }
): Promise<Result<LedgerDocument, DocumentsError>> {
  const result = await deps.documentsRepo.findById(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  return result.value === null ? err(createDocumentNotFoundError(input.id)) : ok(result.value);
}
