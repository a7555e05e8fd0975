import { err, ok, type Result } from 'neverthrow';

import { createDocumentNotFoundError, type DocumentsError } from '../errors.js';

import type { DocumentsRepository } from '../ports.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface DeleteDocumentDeps {
  documentsRepo: DocumentsRepository;
  cacheInvalidator: CacheInvalidator;
}

export async function deleteDocument(
  deps: DeleteDocumentDeps,
  input: { id: string }
): Promise<Result<void, DocumentsError>> {
  const result = await deps.documentsRepo.delete(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (!result.value) {
    return err(createDocumentNotFoundError(input.id));
  }

  await deps.cacheInvalidator.invalidate('document');
  return ok(undefined);
}
