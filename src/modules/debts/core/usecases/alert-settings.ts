/**
 * Debt Alert Settings Use Cases
 *
 * Who is warned before a debt's final due date. One configuration per debt.
 */

import { err, type Result } from 'neverthrow';

import { normalizeRecipients } from '../../../../common/recipients.js';
import { createDebtNotFoundError, createValidationError, type DebtsError } from '../errors.js';

import type { DebtsRepository } from '../ports.js';
import type { DebtAlertSettings } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface DebtAlertSettingsDeps {
  debtsRepo: DebtsRepository;
  cacheInvalidator: CacheInvalidator;
}

export interface ConfigureDebtAlertsInput {
  debtId: string;
  emails: string[];
  active: boolean;
}

export async function configureDebtAlerts(
  deps: DebtAlertSettingsDeps,
  input: ConfigureDebtAlertsInput
): Promise<Result<DebtAlertSettings, DebtsError>> {
  const { debtsRepo, cacheInvalidator } = deps;

  const emails = normalizeRecipients(input.emails);
  if (input.active && emails.length === 0) {
    return err(createValidationError('Active alerts need at least one valid email', 'emails'));
  }

  const debt = await debtsRepo.findById(input.debtId);
  if (debt.isErr()) return err(debt.error);
  if (debt.value === null) {
    return err(createDebtNotFoundError(input.debtId));
  }

  const result = await debtsRepo.upsertAlertSettings(input.debtId, emails, input.active);
  if (result.isOk()) {
    await cacheInvalidator.invalidate('debt');
  }
  return result;
}

/**
 * Returns null when the debt has no alert configuration yet.
 */
export async function getDebtAlertSettings(
  deps: Pick<DebtAlertSettingsDeps, 'debtsRepo'>,
  input: { debtId: string }
): Promise<Result<DebtAlertSettings | null, DebtsError>> {
  const { debtsRepo } = deps;

  const debt = await debtsRepo.findById(input.debtId);
  if (debt.isErr()) return err(debt.error);
  if (debt.value === null) {
    return err(createDebtNotFoundError(input.debtId));
  }

  return debtsRepo.getAlertSettings(input.debtId);
}
