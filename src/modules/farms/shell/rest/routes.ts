/**
 * Farms REST Routes
 */

import {
  CreateFarmBodySchema,
  FarmPersonParamsSchema,
  LinkPersonBodySchema,
  UpdateFarmBodySchema,
  type CreateFarmBody,
  type FarmPersonParams,
  type LinkPersonBody,
  type UpdateFarmBody,
} from './schemas.js';
import { sendData, sendError } from '../../../../common/http.js';
import {
  IdParamsSchema,
  OffsetQuerySchema,
  type IdParams,
  type OffsetQuery,
} from '../../../../common/schemas/http.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { createFarm } from '../../core/usecases/create-farm.js';
import { deleteFarm } from '../../core/usecases/delete-farm.js';
import { linkPerson, listFarmPeople, unlinkPerson } from '../../core/usecases/farm-people.js';
import { getFarm } from '../../core/usecases/get-farm.js';
import { listFarms } from '../../core/usecases/list-farms.js';
import { updateFarm } from '../../core/usecases/update-farm.js';

import type { CacheInvalidator } from '../../../../infra/cache/index.js';
import type { FarmsRepository } from '../../core/ports.js';
import type { Farm, FarmPerson } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeFarmRoutesDeps {
  farmsRepo: FarmsRepository;
  cacheInvalidator: CacheInvalidator;
}

const formatFarm = (farm: Farm) => ({
  id: farm.id,
  name: farm.name,
  registrationNumber: farm.registrationNumber,
  totalArea: farm.totalArea.toString(),
  consolidatedArea: farm.consolidatedArea.toString(),
  availableArea: farm.availableArea.toString(),
  municipality: farm.municipality,
  state: farm.state,
  carReceipt: farm.carReceipt,
  createdAt: farm.createdAt.toISOString(),
  updatedAt: farm.updatedAt.toISOString(),
});

const formatFarmPerson = (link: FarmPerson) => ({
  farmId: link.farmId,
  personId: link.personId,
  personName: link.personName,
  tenure: link.tenure,
  createdAt: link.createdAt.toISOString(),
});

/**
 * Creates the /api/v1/farms routes.
 */
export const makeFarmRoutes = (deps: MakeFarmRoutesDeps): FastifyPluginAsync => {
  const { farmsRepo, cacheInvalidator } = deps;

  return async (fastify) => {
    fastify.post<{ Body: CreateFarmBody }>(
      '/api/v1/farms',
      { schema: { body: CreateFarmBodySchema } },
      async (request, reply) => {
        const result = await createFarm({ farmsRepo, cacheInvalidator }, request.body);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatFarm(result.value), 201);
      }
    );

    fastify.get<{ Querystring: OffsetQuery }>(
      '/api/v1/farms',
      { schema: { querystring: OffsetQuerySchema } },
      async (request, reply) => {
        const result = await listFarms({ farmsRepo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        const { items, total, limit, offset } = result.value;
        return sendData(reply, { items: items.map(formatFarm), total, limit, offset });
      }
    );

    fastify.get<{ Params: IdParams }>(
      '/api/v1/farms/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await getFarm({ farmsRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatFarm(result.value));
      }
    );

    fastify.patch<{ Params: IdParams; Body: UpdateFarmBody }>(
      '/api/v1/farms/:id',
      { schema: { params: IdParamsSchema, body: UpdateFarmBodySchema } },
      async (request, reply) => {
        const result = await updateFarm(
          { farmsRepo, cacheInvalidator },
          { id: request.params.id, updates: request.body }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatFarm(result.value));
      }
    );

    fastify.delete<{ Params: IdParams }>(
      '/api/v1/farms/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await deleteFarm({ farmsRepo, cacheInvalidator }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return reply.status(204).send();
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Farm people
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Params: IdParams }>(
      '/api/v1/farms/:id/people',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await listFarmPeople({ farmsRepo }, { farmId: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, result.value.map(formatFarmPerson));
      }
    );

    fastify.put<{ Params: FarmPersonParams; Body: LinkPersonBody }>(
      '/api/v1/farms/:id/people/:personId',
      { schema: { params: FarmPersonParamsSchema, body: LinkPersonBodySchema } },
      async (request, reply) => {
        const result = await linkPerson(
          { farmsRepo, cacheInvalidator },
          {
            farmId: request.params.id,
            personId: request.params.personId,
            tenure: request.body.tenure,
          }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatFarmPerson(result.value));
      }
    );

    fastify.delete<{ Params: FarmPersonParams }>(
      '/api/v1/farms/:id/people/:personId',
      { schema: { params: FarmPersonParamsSchema } },
      async (request, reply) => {
        const result = await unlinkPerson(
          { farmsRepo, cacheInvalidator },
          { farmId: request.params.id, personId: request.params.personId }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return reply.status(204).send();
      }
    );
  };
};
