import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  createFarm,
  deleteFarm,
  getFarm,
  linkPerson,
  listFarmPeople,
  listFarms,
  unlinkPerson,
  updateFarm,
} from '@/modules/farms/index.js';

import {
  makeFakeFarmsRepo,
  makeFarm,
  makeRecordingInvalidator,
  testId,
} from '../../fixtures/fakes.js';

const farm = makeFarm({
  id: testId(10),
  totalArea: new Decimal('100'),
  consolidatedArea: new Decimal('60'),
});
const personId = testId(1);

describe('createFarm', () => {
  it('stores the farm with its available area and invalidates farm caches', async () => {
    const farmsRepo = makeFakeFarmsRepo();
    const cacheInvalidator = makeRecordingInvalidator();

    const result = await createFarm(
      { farmsRepo, cacheInvalidator },
      {
        name: 'Fazenda Nova',
        registrationNumber: 'MAT-002',
        totalArea: '50',
        consolidatedArea: '20.5',
        municipality: 'Jataí',
        state: 'GO',
      }
    );

    expect(result._unsafeUnwrap().availableArea.toString()).toBe('29.5');
    expect(cacheInvalidator.invalidated).toEqual(['farm']);
  });

  it('reports a duplicate registration number', async () => {
    const farmsRepo = makeFakeFarmsRepo({ farms: [farm] });

    const result = await createFarm(
      { farmsRepo, cacheInvalidator: makeRecordingInvalidator() },
      {
        name: 'Copy',
        registrationNumber: farm.registrationNumber,
        totalArea: '1',
        consolidatedArea: '0',
        municipality: 'Rio Verde',
        state: 'GO',
      }
    );

    expect(result._unsafeUnwrapErr().type).toBe('FarmConflictError');
  });
});

describe('getFarm and listFarms', () => {
  it('returns not found for unknown farms', async () => {
    const result = await getFarm({ farmsRepo: makeFakeFarmsRepo() }, { id: testId(99) });
    expect(result._unsafeUnwrapErr().type).toBe('FarmNotFoundError');
  });

  it('lists with default pagination', async () => {
    const result = await listFarms({ farmsRepo: makeFakeFarmsRepo({ farms: [farm] }) }, {});
    expect(result._unsafeUnwrap()).toMatchObject({ total: 1, limit: 20, offset: 0 });
  });
});

describe('updateFarm', () => {
  it('validates the merged farm', async () => {
    const farmsRepo = makeFakeFarmsRepo({ farms: [farm] });

    const result = await updateFarm(
      { farmsRepo, cacheInvalidator: makeRecordingInvalidator() },
      { id: farm.id, updates: { totalArea: '10' } }
    );

    expect(result._unsafeUnwrapErr().type).toBe('ValidationError');
  });

  it('recomputes the available area', async () => {
    const farmsRepo = makeFakeFarmsRepo({ farms: [farm] });
    const cacheInvalidator = makeRecordingInvalidator();

    const result = await updateFarm(
      { farmsRepo, cacheInvalidator },
      { id: farm.id, updates: { consolidatedArea: '75' } }
    );

    expect(result._unsafeUnwrap().availableArea.toString()).toBe('25');
    expect(cacheInvalidator.invalidated).toEqual(['farm']);
  });

  it('returns not found for unknown farms', async () => {
    const result = await updateFarm(
      { farmsRepo: makeFakeFarmsRepo(), cacheInvalidator: makeRecordingInvalidator() },
      { id: testId(99), updates: {} }
    );

    expect(result._unsafeUnwrapErr().type).toBe('FarmNotFoundError');
  });
});

describe('deleteFarm', () => {
  it('returns not found when nothing was deleted', async () => {
    const result = await deleteFarm(
      { farmsRepo: makeFakeFarmsRepo(), cacheInvalidator: makeRecordingInvalidator() },
      { id: testId(99) }
    );

    expect(result._unsafeUnwrapErr().type).toBe('FarmNotFoundError');
  });
});

describe('farm people', () => {
  it('links a person with a tenure and lists them', async () => {
    const farmsRepo = makeFakeFarmsRepo({ farms: [farm], personIds: [personId] });
    const cacheInvalidator = makeRecordingInvalidator();

    const linked = await linkPerson(
      { farmsRepo, cacheInvalidator },
      { farmId: farm.id, personId, tenure: 'leased' }
    );
    const people = await listFarmPeople({ farmsRepo }, { farmId: farm.id });

    expect(linked._unsafeUnwrap().tenure).toBe('leased');
    expect(people._unsafeUnwrap().map((link) => link.personId)).toEqual([personId]);
    expect(cacheInvalidator.invalidated).toEqual(['farm']);
  });

  it('replaces the tenure when linking again', async () => {
    const farmsRepo = makeFakeFarmsRepo({ farms: [farm], personIds: [personId] });
    const deps = { farmsRepo, cacheInvalidator: makeRecordingInvalidator() };

    await linkPerson(deps, { farmId: farm.id, personId, tenure: 'leased' });
    await linkPerson(deps, { farmId: farm.id, personId, tenure: 'owned' });
    const people = await listFarmPeople({ farmsRepo }, { farmId: farm.id });

    expect(people._unsafeUnwrap().map((link) => link.tenure)).toEqual(['owned']);
  });

  it('rejects unknown farms and people', async () => {
    const farmsRepo = makeFakeFarmsRepo({ farms: [farm] });
    const deps = { farmsRepo, cacheInvalidator: makeRecordingInvalidator() };

    const unknownFarm = await linkPerson(deps, { farmId: testId(99), personId, tenure: 'owned' });
    const unknownPerson = await linkPerson(deps, { farmId: farm.id, personId, tenure: 'owned' });

    expect(unknownFarm._unsafeUnwrapErr().type).toBe('FarmNotFoundError');
    expect(unknownPerson._unsafeUnwrapErr().type).toBe('LinkedPersonNotFoundError');
  });

  it('reports unlinking a person who is not linked', async () => {
    const farmsRepo = makeFakeFarmsRepo({ farms: [farm], personIds: [personId] });

    const result = await unlinkPerson(
      { farmsRepo, cacheInvalidator: makeRecordingInvalidator() },
      { farmId: farm.id, personId }
    );

    expect(result._unsafeUnwrapErr().type).toBe('FarmLinkNotFoundError');
  });
});
