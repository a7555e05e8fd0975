/**
 * Documents Module - Public API
 *
 * Certificates, contracts and land documents with their expiry alert settings.
 */

export type {
  LedgerDocument,
  DocumentKind,
  DocumentFields,
  DocumentListFilter,
  CreateDocumentInput,
  UpdateDocumentInput,
} from './core/types.js';
export { DOCUMENT_KINDS, MAX_ALERT_THRESHOLD_DAYS, isDocumentKind } from './core/types.js';

export type { DocumentsError, DocumentNotFoundError } from './core/errors.js';
export {
  createDocumentNotFoundError,
  createMissingReferenceError,
  DOCUMENTS_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

export type { DocumentsRepository } from './core/ports.js';
export { validateDocumentInput, normalizeAlertThresholds } from './core/validation.js';

export { createDocument, type CreateDocumentDeps } from './core/usecases/create-document.js';
export { getDocument, type GetDocumentDeps } from './core/usecases/get-document.js';
export {
  listDocuments,
  type ListDocumentsDeps,
  type ListDocumentsInput,
} from './core/usecases/list-documents.js';
export { updateDocument, type UpdateDocumentDeps } from './core/usecases/update-document.js';
export { deleteDocument, type DeleteDocumentDeps } from './core/usecases/delete-document.js';

export { makeDocumentsRepo, type DocumentsRepoOptions } from './shell/repo/documents-repo.js';
export { makeDocumentRoutes, type MakeDocumentRoutesDeps } from './shell/rest/routes.js';
