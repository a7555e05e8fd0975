/**
 * Debts Module - Input Validation
 */

import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import {
  isDebtFarmPurpose,
  isRateBasis,
  type DebtFarmLink,
  type DebtFarmLinkInput,
  type DebtFields,
  type DebtFieldsInput,
  type InstallmentInput,
  type NewInstallment,
} from './types.js';
import { isIsoDate } from '../../../common/dates.js';
import { parseDecimal } from '../../../common/decimal.js';

import type { Decimal } from 'decimal.js';

const requiredText = (value: string, field: string): Result<string, ValidationError> => {
  const trimmed = value.trim();
  return trimmed === '' ? err(createValidationError(`${field} is required`, field)) : ok(trimmed);
};

export const isoDate = (value: string, field: string): Result<string, ValidationError> =>
  isIsoDate(value)
    ? ok(value)
    : err(createValidationError(`${field} must be a valid date`, field));

export const positiveAmount = (value: string, field: string): Result<Decimal, ValidationError> => {
  const parsed = parseDecimal(value);
  if (parsed === null || !parsed.isPositive() || parsed.isZero()) {
    return err(createValidationError(`${field} must be greater than zero`, field));
  }
  return ok(parsed);
};

const nonNegativeAmount = (value: string, field: string): Result<Decimal, ValidationError> => {
  const parsed = parseDecimal(value);
  if (parsed === null || parsed.isNegative()) {
    return err(createValidationError(`${field} must be zero or more`, field));
  }
  return ok(parsed);
};

const optionalText = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
};

// ─────────────────────────────────────────────────────────────────────────────
// Debt
// ─────────────────────────────────────────────────────────────────────────────

export const validateDebtFields = (input: DebtFieldsInput): Result<DebtFields, ValidationError> => {
  const bank = requiredText(input.bank, 'bank');
  if (bank.isErr()) return err(bank.error);

  const proposalNumber = requiredText(input.proposalNumber, 'proposalNumber');
  if (proposalNumber.isErr()) return err(proposalNumber.error);

  const issuedOn = isoDate(input.issuedOn, 'issuedOn');
  if (issuedOn.isErr()) return err(issuedOn.error);

  const finalDueOn = isoDate(input.finalDueOn, 'finalDueOn');
  if (finalDueOn.isErr()) return err(finalDueOn.error);

  // ISO dates compare correctly as strings
  if (finalDueOn.value < issuedOn.value) {
    return err(createValidationError('finalDueOn cannot be before issuedOn', 'finalDueOn'));
  }

  const interestRate = nonNegativeAmount(input.interestRate, 'interestRate');
  if (interestRate.isErr()) return err(interestRate.error);

  if (!isRateBasis(input.rateBasis)) {
    return err(createValidationError(`Unknown rate basis '${input.rateBasis}'`, 'rateBasis'));
  }

  const gracePeriodMonths = input.gracePeriodMonths ?? null;
  if (
    gracePeriodMonths !== null &&
    (!Number.isInteger(gracePeriodMonths) || gracePeriodMonths < 0)
  ) {
    return err(
      createValidationError(
        'gracePeriodMonths must be a whole number of months',
        'gracePeriodMonths'
      )
    );
  }

  const amount = positiveAmount(input.amount, 'amount');
  if (amount.isErr()) return err(amount.error);

  return ok({
    bank: bank.value,
    proposalNumber: proposalNumber.value,
    issuedOn: issuedOn.value,
    finalDueOn: finalDueOn.value,
    interestRate: interestRate.value,
    rateBasis: input.rateBasis,
    gracePeriodMonths,
    amount: amount.value,
  });
};

/**
 * Drops repeated ids, keeping the first occurrence.
 */
export const uniqueIds = (ids: readonly string[]): string[] => [...new Set(ids)];

/**
 * Validates farm links; a repeated (farm, purpose) pair keeps the last one.
 */
export const validateFarmLinks = (
  links: readonly DebtFarmLinkInput[]
): Result<DebtFarmLink[], ValidationError> => {
  const byKey = new Map<string, DebtFarmLink>();

  for (const link of links) {
    if (!isDebtFarmPurpose(link.purpose)) {
      return err(
        createValidationError(`Unknown farm link purpose '${link.purpose}'`, 'farmLinks')
      );
    }

    let hectares: Decimal | null = null;
    if (link.hectares !== undefined && link.hectares !== null) {
      const parsed = nonNegativeAmount(link.hectares, 'farmLinks');
      if (parsed.isErr()) return err(parsed.error);
      hectares = parsed.value;
    }

    byKey.set(`${link.farmId}:${link.purpose}`, {
      farmId: link.farmId,
      purpose: link.purpose,
      hectares,
    });
  }

  return ok([...byKey.values()]);
};

// ─────────────────────────────────────────────────────────────────────────────
// Installments
// ─────────────────────────────────────────────────────────────────────────────

export const validateInstallment = (
  input: InstallmentInput
): Result<NewInstallment, ValidationError> => {
  const dueOn = isoDate(input.dueOn, 'dueOn');
  if (dueOn.isErr()) return err(dueOn.error);

  const amount = positiveAmount(input.amount, 'amount');
  if (amount.isErr()) return err(amount.error);

  return ok({ dueOn: dueOn.value, amount: amount.value, notes: optionalText(input.notes) });
};

export const validateInstallments = (
  inputs: readonly InstallmentInput[]
): Result<NewInstallment[], ValidationError> => {
  const installments: NewInstallment[] = [];
  for (const input of inputs) {
    const installment = validateInstallment(input);
    if (installment.isErr()) return err(installment.error);
    installments.push(installment.value);
  }
  return ok(installments);
};
