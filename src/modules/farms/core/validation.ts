/**
 * Farms Module - Input Validation
 */

import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import { parseDecimal } from '../../../common/decimal.js';

import type { CreateFarmInput, FarmFields } from './types.js';
import type { Decimal } from 'decimal.js';

const STATE_PATTERN = /^[A-Z]{2}$/;

const requiredText = (value: string, field: string): Result<string, ValidationError> => {
  const trimmed = value.trim();
  return trimmed === ''
    ? err(createValidationError(`${field} is required`, field))
    : ok(trimmed);
};

const area = (value: string, field: string): Result<Decimal, ValidationError> => {
  const parsed = parseDecimal(value);
  if (parsed === null || parsed.isNegative()) {
    return err(createValidationError(`${field} must be a non-negative number`, field));
  }
  return ok(parsed);
};

/**
 * Validates a complete farm. Updates merge the patch over the stored farm first,
 * so the area rule is checked on the final values.
 */
export const validateFarmInput = (input: CreateFarmInput): Result<FarmFields, ValidationError> => {
  const name = requiredText(input.name, 'name');
  if (name.isErr()) return err(name.error);

  const registrationNumber = requiredText(input.registrationNumber, 'registrationNumber');
  if (registrationNumber.isErr()) return err(registrationNumber.error);

  const municipality = requiredText(input.municipality, 'municipality');
  if (municipality.isErr()) return err(municipality.error);

  const state = input.state.trim().toUpperCase();
  if (!STATE_PATTERN.test(state)) {
    return err(createValidationError('state must be a two-letter code', 'state'));
  }

  const totalArea = area(input.totalArea, 'totalArea');
  if (totalArea.isErr()) return err(totalArea.error);

  const consolidatedArea = area(input.consolidatedArea, 'consolidatedArea');
  if (consolidatedArea.isErr()) return err(consolidatedArea.error);

  if (consolidatedArea.value.greaterThan(totalArea.value)) {
    return err(
      createValidationError('consolidatedArea cannot exceed totalArea', 'consolidatedArea')
    );
  }

  const carReceipt = input.carReceipt?.trim() ?? '';

  return ok({
    name: name.value,
    registrationNumber: registrationNumber.value,
    totalArea: totalArea.value,
    consolidatedArea: consolidatedArea.value,
    municipality: municipality.value,
    state,
    carReceipt: carReceipt === '' ? null : carReceipt,
  });
};
