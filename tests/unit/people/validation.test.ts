import { describe, expect, it } from 'vitest';

import { validateNewPerson, validatePersonPatch } from '@/modules/people/core/validation.js';

describe('validateNewPerson', () => {
  it('trims text, strips tax id punctuation and blanks optional fields', () => {
    const result = validateNewPerson({
      name: '  Ana Souza ',
      taxId: '123.456.789-01',
      email: ' ',
      phone: ' (64) 99999-0000 ',
    });

    expect(result._unsafeUnwrap()).toEqual({
      name: 'Ana Souza',
      taxId: '12345678901',
      email: null,
      phone: '(64) 99999-0000',
      address: null,
    });
  });

  it('requires a name', () => {
    const result = validateNewPerson({ name: '   ', taxId: '12345678901' });
    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'ValidationError',
      message: 'Name is required',
      field: 'name',
    });
  });

  it('rejects tax ids of the wrong length', () => {
    const result = validateNewPerson({ name: 'Ana', taxId: '123' });
    expect(result._unsafeUnwrapErr().field).toBe('taxId');
  });

  it('rejects emails without @', () => {
    const result = validateNewPerson({ name: 'Ana', taxId: '12345678901', email: 'ana' });
    expect(result._unsafeUnwrapErr().field).toBe('email');
  });
});

describe('validatePersonPatch', () => {
  it('only includes provided fields', () => {
    expect(validatePersonPatch({ phone: '' })._unsafeUnwrap()).toEqual({ phone: null });
    expect(validatePersonPatch({})._unsafeUnwrap()).toEqual({});
  });

  it('validates provided fields', () => {
    expect(validatePersonPatch({ taxId: '1' })._unsafeUnwrapErr().field).toBe('taxId');
  });
});
