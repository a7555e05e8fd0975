/**
 * Debts Module - Public API
 *
 * Bank financing, installments, and per-debt alert recipients.
 */

export type {
  Debt,
  DebtFields,
  DebtLinks,
  DebtFarmLink,
  DebtFarmPurpose,
  DebtAlertSettings,
  DebtListFilter,
  Installment,
  DueInstallment,
  DueInstallments,
  NewInstallment,
  RateBasis,
  CreateDebtInput,
  UpdateDebtInput,
  InstallmentInput,
} from './core/types.js';
export {
  RATE_BASES,
  DEBT_FARM_PURPOSES,
  isRateBasis,
  isDebtFarmPurpose,
  computeOutstandingAmount,
  INSTALLMENT_DUE_SOON_DAYS,
} from './core/types.js';

export type {
  DebtsError,
  DebtNotFoundError,
  InstallmentNotFoundError,
  InstallmentAlreadyPaidError,
} from './core/errors.js';
export {
  createDebtNotFoundError,
  createInstallmentNotFoundError,
  createInstallmentAlreadyPaidError,
  DEBTS_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

export type { DebtsRepository } from './core/ports.js';

export { createDebt, type CreateDebtDeps } from './core/usecases/create-debt.js';
export { getDebt, type GetDebtDeps } from './core/usecases/get-debt.js';
export { listDebts, type ListDebtsDeps, type ListDebtsInput } from './core/usecases/list-debts.js';
export { updateDebt, type UpdateDebtDeps } from './core/usecases/update-debt.js';
export { deleteDebt, type DeleteDebtDeps } from './core/usecases/delete-debt.js';
export {
  addInstallment,
  payInstallment,
  removeInstallment,
  type InstallmentsDeps,
  type PayInstallmentInput,
} from './core/usecases/installments.js';
export {
  listDueInstallments,
  type ListDueInstallmentsDeps,
  type ListDueInstallmentsInput,
} from './core/usecases/list-due-installments.js';
export {
  configureDebtAlerts,
  getDebtAlertSettings,
  type DebtAlertSettingsDeps,
  type ConfigureDebtAlertsInput,
} from './core/usecases/alert-settings.js';

export { makeDebtsRepo, type DebtsRepoOptions } from './shell/repo/debts-repo.js';
export { makeDebtRoutes, type MakeDebtRoutesDeps } from './shell/rest/routes.js';
