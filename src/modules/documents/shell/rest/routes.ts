/**
 * Documents REST Routes
 */

import {
  CreateDocumentBodySchema,
  ListDocumentsQuerySchema,
  UpdateDocumentBodySchema,
  type CreateDocumentBody,
  type ListDocumentsQuery,
  type UpdateDocumentBody,
} from './schemas.js';
import { todayIn } from '../../../../common/dates.js';
import { sendData, sendError } from '../../../../common/http.js';
import { IdParamsSchema, type IdParams } from '../../../../common/schemas/http.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { createDocument } from '../../core/usecases/create-document.js';
import { deleteDocument } from '../../core/usecases/delete-document.js';
import { getDocument } from '../../core/usecases/get-document.js';
import { listDocuments } from '../../core/usecases/list-documents.js';
import { updateDocument } from '../../core/usecases/update-document.js';

import type { CacheInvalidator } from '../../../../infra/cache/index.js';
import type { DocumentsRepository } from '../../core/ports.js';
import type { LedgerDocument } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeDocumentRoutesDeps {
  documentsRepo: DocumentsRepository;
  cacheInvalidator: CacheInvalidator;
  /** Timezone that decides "today" for expiry filters */
  timeZone: string;
}

const formatDocument = (document: LedgerDocument) => ({
  ...document,
  createdAt: document.createdAt.toISOString(),
  updatedAt: document.updatedAt.toISOString(),
});

export const makeDocumentRoutes = (deps: MakeDocumentRoutesDeps): FastifyPluginAsync => {
  const { documentsRepo, cacheInvalidator, timeZone } = deps;

  return async (fastify) => {
    fastify.post<{ Body: CreateDocumentBody }>(
      '/api/v1/documents',
      { schema: { body: CreateDocumentBodySchema } },
      async (request, reply) => {
        const result = await createDocument({ documentsRepo, cacheInvalidator }, request.body);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatDocument(result.value), 201);
      }
    );

    fastify.get<{ Querystring: ListDocumentsQuery }>(
      '/api/v1/documents',
      { schema: { querystring: ListDocumentsQuerySchema } },
      async (request, reply) => {
        const result = await listDocuments(
          { documentsRepo },
          { ...request.query, today: todayIn(timeZone) }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        const { items, total, limit, offset } = result.value;
        return sendData(reply, { items: items.map(formatDocument), total, limit, offset });
      }
    );

    fastify.get<{ Params: IdParams }>(
      '/api/v1/documents/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await getDocument({ documentsRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatDocument(result.value));
      }
    );

    fastify.patch<{ Params: IdParams; Body: UpdateDocumentBody }>(
      '/api/v1/documents/:id',
      { schema: { params: IdParamsSchema, body: UpdateDocumentBodySchema } },
      async (request, reply) => {
        const result = await updateDocument(
          { documentsRepo, cacheInvalidator },
          { id: request.params.id, updates: request.body }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatDocument(result.value));
      }
    );

    fastify.delete<{ Params: IdParams }>(
      '/api/v1/documents/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await deleteDocument(
          { documentsRepo, cacheInvalidator },
          { id: request.params.id }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return reply.status(204).send();
      }
    );
  };
};
