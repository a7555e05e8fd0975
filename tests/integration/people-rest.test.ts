import fastifyLib, { type FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it } from 'vitest';

import { AJV_OPTIONS } from '@/app/build-app.js';
import { makePeopleRoutes } from '@/modules/people/index.js';

import {
  makeFakePeopleRepo,
  makePerson,
  makeRecordingInvalidator,
  testId,
  type FakePeopleRepo,
  type RecordingCacheInvalidator,
} from '../fixtures/fakes.js';

describe('People REST API', () => {
  let app: FastifyInstance | undefined;
  let peopleRepo: FakePeopleRepo;
  let invalidator: RecordingCacheInvalidator;

  const setup = async (
    people = [makePerson()],
    farmlessDocuments: Record<string, number> = {}
  ): Promise<FastifyInstance> => {
    peopleRepo = makeFakePeopleRepo({ people, farmlessDocuments });
    invalidator = makeRecordingInvalidator();
    app = fastifyLib({ logger: false, ajv: AJV_OPTIONS });
    await app.register(makePeopleRoutes({ peopleRepo, cacheInvalidator: invalidator }));
    await app.ready();
    return app;
  };

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  describe('POST /api/v1/people', () => {
    it('creates a person with a normalized tax id', async () => {
      const server = await setup([]);

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/people',
        payload: { name: '  Carla Dias ', taxId: '987.654.321-00', email: '' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({
        ok: true,
        data: {
          id: testId(1000),
          name: 'Carla Dias',
          taxId: '98765432100',
          formattedTaxId: '987.654.321-00',
          email: null,
          phone: null,
          address: null,
          createdAt: '2024-01-15T12:00:00.000Z',
          updatedAt: '2024-01-15T12:00:00.000Z',
        },
      });
      expect(invalidator.invalidated).toEqual(['person']);
    });

    it('rejects a malformed tax id', async () => {
      const server = await setup([]);

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/people',
        payload: { name: 'Carla Dias', taxId: '123' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        ok: false,
        error: 'ValidationError',
        message: 'Tax id must have 11 (CPF) or 14 (CNPJ) digits',
      });
      expect(invalidator.invalidated).toEqual([]);
    });

    it('rejects a duplicate tax id', async () => {
      const server = await setup();

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/people',
        payload: { name: 'Outra Ana', taxId: '123.456.789-01' },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toEqual({
        ok: false,
        error: 'PersonConflictError',
        message: "A person with tax id '12345678901' already exists",
      });
    });

    it('rejects unknown body fields', async () => {
      const server = await setup([]);

      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/people',
        payload: { name: 'Carla Dias', taxId: '98765432100', nickname: 'Cal' },
      });

      expect(response.statusCode).toBe(400);
      expect(invalidator.invalidated).toEqual([]);
    });
  });

  describe('GET /api/v1/people/search', () => {
    it('returns formatted hits with pagination', async () => {
      const server = await setup([
        makePerson(),
        makePerson({ id: testId(2), name: 'Anabela Reis', taxId: '12345678000195' }),
        makePerson({ id: testId(3), name: 'Bruno Lima', taxId: '98765432100' }),
      ]);

      const response = await server.inject({
        method: 'GET',
        url: '/api/v1/people/search?q=ana&limit=1',
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: [
          {
            id: testId(1),
            name: 'Ana Souza',
            taxId: '12345678901',
            formattedTaxId: '123.456.789-01',
            email: 'ana@example.com',
            phone: null,
          },
        ],
        pagination: {
          page: 1,
          limit: 1,
          total: 2,
          totalPages: 2,
          hasNext: true,
          hasPrev: false,
        },
      });
    });

    it('matches on tax id digits', async () => {
      const server = await setup([
        makePerson(),
        makePerson({ id: testId(2), name: 'Agro Norte Ltda', taxId: '12345678000195' }),
      ]);

      const response = await server.inject({
        method: 'GET',
        url: '/api/v1/people/search?q=0001-95',
      });

      const body: { data: { name: string; formattedTaxId: string }[] } = response.json();
      expect(body.data).toEqual([
        expect.objectContaining({
          name: 'Agro Norte Ltda',
          formattedTaxId: '12.345.678/0001-95',
        }),
      ]);
    });

    it('returns nothing for a one-character term without touching the store', async () => {
      const server = await setup();

      const response = await server.inject({ method: 'GET', url: '/api/v1/people/search?q=a' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ ok: true, data: [], pagination: { total: 0 } });
      expect(peopleRepo.searchCalls()).toBe(0);
    });

    it('is not shadowed by the id route', async () => {
      const server = await setup();

      const response = await server.inject({ method: 'GET', url: '/api/v1/people/search' });

      expect(response.statusCode).toBe(200);
    });
  });

  describe('GET /api/v1/people/:id', () => {
    it('returns the person', async () => {
      const server = await setup();

      const response = await server.inject({ method: 'GET', url: `/api/v1/people/${testId(1)}` });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        ok: true,
        data: { id: testId(1), formattedTaxId: '123.456.789-01' },
      });
    });

    it('returns 404 for an unknown id', async () => {
      const server = await setup();

      const response = await server.inject({ method: 'GET', url: `/api/v1/people/${testId(99)}` });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'PersonNotFoundError',
        message: `Person with ID '${testId(99)}' not found`,
      });
    });
  });

  describe('PATCH and DELETE', () => {
    it('updates only the given fields', async () => {
      const server = await setup();

      const response = await server.inject({
        method: 'PATCH',
        url: `/api/v1/people/${testId(1)}`,
        payload: { phone: '+55 11 99999-0000' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        ok: true,
        data: { name: 'Ana Souza', phone: '+55 11 99999-0000' },
      });
      expect(invalidator.invalidated).toEqual(['person']);
    });

    it('deletes a person', async () => {
      const server = await setup();

      const deleted = await server.inject({
        method: 'DELETE',
        url: `/api/v1/people/${testId(1)}`,
      });
      const after = await server.inject({ method: 'GET', url: `/api/v1/people/${testId(1)}` });

      expect(deleted.statusCode).toBe(204);
      expect(after.statusCode).toBe(404);
    });

    it('returns 409 when the person is the only owner of a document', async () => {
      const server = await setup([makePerson()], { [testId(1)]: 1 });

      const deleted = await server.inject({
        method: 'DELETE',
        url: `/api/v1/people/${testId(1)}`,
      });
      const after = await server.inject({ method: 'GET', url: `/api/v1/people/${testId(1)}` });

      expect(deleted.statusCode).toBe(409);
      expect(deleted.json()).toEqual({
        ok: false,
        error: 'PersonInUseError',
        message: `Person with ID '${testId(1)}' owns 1 document(s) without a farm`,
      });
      expect(after.statusCode).toBe(200);
    });
  });
});
