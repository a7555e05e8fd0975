/**
 * People REST Routes
 */

import {
  CreatePersonBodySchema,
  SearchPeopleQuerySchema,
  UpdatePersonBodySchema,
  type CreatePersonBody,
  type SearchPeopleQuery,
  type UpdatePersonBody,
} from './schemas.js';
import { sendData, sendError } from '../../../../common/http.js';
import {
  IdParamsSchema,
  OffsetQuerySchema,
  type IdParams,
  type OffsetQuery,
} from '../../../../common/schemas/http.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { formatTaxId } from '../../core/tax-id.js';
import { createPerson } from '../../core/usecases/create-person.js';
import { deletePerson } from '../../core/usecases/delete-person.js';
import { getPerson } from '../../core/usecases/get-person.js';
import { listPeople } from '../../core/usecases/list-people.js';
import { searchPeople } from '../../core/usecases/search-people.js';
import { updatePerson } from '../../core/usecases/update-person.js';

import type { CacheInvalidator } from '../../../../infra/cache/index.js';
import type { PeopleRepository } from '../../core/ports.js';
import type { Person } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakePeopleRoutesDeps {
  peopleRepo: PeopleRepository;
  cacheInvalidator: CacheInvalidator;
}

export const formatPerson = (person: Person) => ({
  id: person.id,
  name: person.name,
  taxId: person.taxId,
  formattedTaxId: formatTaxId(person.taxId),
  email: person.email,
  phone: person.phone,
  address: person.address,
  createdAt: person.createdAt.toISOString(),
  updatedAt: person.updatedAt.toISOString(),
});

/**
 * Creates the /api/v1/people routes.
 */
export const makePeopleRoutes = (deps: MakePeopleRoutesDeps): FastifyPluginAsync => {
  const { peopleRepo, cacheInvalidator } = deps;

  return async (fastify) => {
    fastify.post<{ Body: CreatePersonBody }>(
      '/api/v1/people',
      { schema: { body: CreatePersonBodySchema } },
      async (request, reply) => {
        const result = await createPerson({ peopleRepo, cacheInvalidator }, request.body);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatPerson(result.value), 201);
      }
    );

    fastify.get<{ Querystring: OffsetQuery }>(
      '/api/v1/people',
      { schema: { querystring: OffsetQuerySchema } },
      async (request, reply) => {
        const result = await listPeople({ peopleRepo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        const { items, total, limit, offset } = result.value;
        return sendData(reply, { items: items.map(formatPerson), total, limit, offset });
      }
    );

    // Registered before /:id so "search" is never taken for an id
    fastify.get<{ Querystring: SearchPeopleQuery }>(
      '/api/v1/people/search',
      { schema: { querystring: SearchPeopleQuerySchema } },
      async (request, reply) => {
        const { q, page, limit } = request.query;
        const result = await searchPeople(
          { peopleRepo },
          { term: q, ...(page !== undefined && { page }), ...(limit !== undefined && { limit }) }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return reply.status(200).send({ ok: true, ...result.value });
      }
    );

    fastify.get<{ Params: IdParams }>(
      '/api/v1/people/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await getPerson({ peopleRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatPerson(result.value));
      }
    );

    fastify.patch<{ Params: IdParams; Body: UpdatePersonBody }>(
      '/api/v1/people/:id',
      { schema: { params: IdParamsSchema, body: UpdatePersonBodySchema } },
      async (request, reply) => {
        const result = await updatePerson(
          { peopleRepo, cacheInvalidator },
          { id: request.params.id, updates: request.body }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatPerson(result.value));
      }
    );

    fastify.delete<{ Params: IdParams }>(
      '/api/v1/people/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await deletePerson(
          { peopleRepo, cacheInvalidator },
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
