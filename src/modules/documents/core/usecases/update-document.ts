/**
 * Update Document Use Case
 *
 * Merges the patch over the stored document and re-validates the result,
 * so kind/customKind and farm/person rules hold on the final values.
 */

import { err, ok, type Result } from 'neverthrow';

import { createDocumentNotFoundError, type DocumentsError } from '../errors.js';
import { validateDocumentInput } from '../validation.js';

import type { DocumentsRepository } from '../ports.js';
import type { CreateDocumentInput, LedgerDocument, UpdateDocumentInput } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface UpdateDocumentDeps {
  documentsRepo: DocumentsRepository;
  cacheInvalidator: CacheInvalidator;
}

const toInput = (document: LedgerDocument): CreateDocumentInput => ({
  name: document.name,
  kind: document.kind,
  customKind: document.customKind,
  issuedOn: document.issuedOn,
  expiresOn: document.expiresOn,
  farmId: document.farmId,
  personId: document.personId,
  alertEmails: document.alertEmails,
  alertThresholds: document.alertThresholds,
  alertsEnabled: document.alertsEnabled,
});

export async function updateDocument(
  deps: UpdateDocumentDeps,
  input: { id: string; updates: UpdateDocumentInput }
): Promise<Result<LedgerDocument, DocumentsError>> {
  const { documentsRepo, cacheInvalidator } = deps;

  const existing = await documentsRepo.findById(input.id);
  if (existing.isErr()) {
    return err(existing.error);
  }
  if (existing.value === null) {
    return err(createDocumentNotFoundError(input.id));
  }

  const fields = validateDocumentInput({ ...toInput(existing.value), ...input.updates });
  if (fields.isErr()) {
    return err(fields.error);
  }

  const result = await documentsRepo.update(input.id, fields.value);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createDocumentNotFoundError(input.id));
  }

  await cacheInvalidator.invalidate('document');
  return ok(result.value);
}
