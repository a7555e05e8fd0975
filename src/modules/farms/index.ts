/**
 * Farms Module - Public API
 *
 * Farms with their areas, and the people who hold them.
 */

export type {
  Farm,
  FarmFields,
  FarmPerson,
  FarmTenure,
  CreateFarmInput,
  UpdateFarmInput,
} from './core/types.js';
export { FARM_TENURES, isFarmTenure } from './core/types.js';

export type {
  FarmsError,
  FarmNotFoundError,
  FarmConflictError,
  LinkedPersonNotFoundError,
  FarmLinkNotFoundError,
} from './core/errors.js';
export {
  createFarmNotFoundError,
  createFarmConflictError,
  createLinkedPersonNotFoundError,
  createFarmLinkNotFoundError,
  FARMS_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

export type { FarmsRepository } from './core/ports.js';
export { validateFarmInput } from './core/validation.js';

export { createFarm, type CreateFarmDeps } from './core/usecases/create-farm.js';
export { getFarm, type GetFarmDeps } from './core/usecases/get-farm.js';
export { listFarms, type ListFarmsDeps } from './core/usecases/list-farms.js';
export {
  updateFarm,
  type UpdateFarmDeps,
  type UpdateFarmUseCaseInput,
} from './core/usecases/update-farm.js';
export { deleteFarm, type DeleteFarmDeps } from './core/usecases/delete-farm.js';
export {
  listFarmPeople,
  linkPerson,
  unlinkPerson,
  type FarmPeopleDeps,
} from './core/usecases/farm-people.js';

export { makeFarmsRepo, type FarmsRepoOptions } from './shell/repo/farms-repo.js';
export { makeFarmRoutes, type MakeFarmRoutesDeps } from './shell/rest/routes.js';
