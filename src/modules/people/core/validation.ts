/**
 * People Module - Input Validation
 */

import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import { isValidTaxId, normalizeTaxId } from './tax-id.js';
import {
  NAME_MAX_LENGTH,
  type CreatePersonInput,
  type NewPerson,
  type PersonPatch,
} from './types.js';

const blankToNull = (value: string | null | undefined): string | null => {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
};

const validateName = (name: string): Result<string, ValidationError> => {
  const trimmed = name.trim();
  if (trimmed === '') {
    return err(createValidationError('Name is required', 'name'));
  }
  if (trimmed.length > NAME_MAX_LENGTH) {
    return err(
      createValidationError(`Name must be at most ${String(NAME_MAX_LENGTH)} characters`, 'name')
    );
  }
  return ok(trimmed);
};

const validateTaxId = (taxId: string): Result<string, ValidationError> => {
  const digits = normalizeTaxId(taxId);
  if (!isValidTaxId(digits)) {
    return err(createValidationError('Tax id must have 11 (CPF) or 14 (CNPJ) digits', 'taxId'));
  }
  return ok(digits);
};

const validateEmail = (email: string | null): Result<string | null, ValidationError> => {
  if (email !== null && !email.includes('@')) {
    return err(createValidationError('Invalid email address', 'email'));
  }
  return ok(email);
};

export const validateNewPerson = (input: CreatePersonInput): Result<NewPerson, ValidationError> => {
  const name = validateName(input.name);
  if (name.isErr()) return err(name.error);

  const taxId = validateTaxId(input.taxId);
  if (taxId.isErr()) return err(taxId.error);

  const email = validateEmail(blankToNull(input.email));
  if (email.isErr()) return err(email.error);

  return ok({
    name: name.value,
    taxId: taxId.value,
    email: email.value,
    phone: blankToNull(input.phone),
    address: blankToNull(input.address),
  });
};

/**
 * Validates only the fields present in the update.
 */
export const validatePersonPatch = (
  input: Partial<CreatePersonInput>
): Result<PersonPatch, ValidationError> => {
  const patch: PersonPatch = {};

  if (input.name !== undefined) {
    const name = validateName(input.name);
    if (name.isErr()) return err(name.error);
    patch.name = name.value;
  }

  if (input.taxId !== undefined) {
    const taxId = validateTaxId(input.taxId);
    if (taxId.isErr()) return err(taxId.error);
    patch.taxId = taxId.value;
  }

  if (input.email !== undefined) {
    const email = validateEmail(blankToNull(input.email));
    if (email.isErr()) return err(email.error);
    patch.email = email.value;
  }

  if (input.phone !== undefined) patch.phone = blankToNull(input.phone);
  if (input.address !== undefined) patch.address = blankToNull(input.address);

  return ok(patch);
};
