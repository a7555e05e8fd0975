import { describe, expect, it } from 'vitest';

import {
  normalizeAlertThresholds,
  validateDocumentInput,
  type CreateDocumentInput,
} from '@/modules/documents/index.js';

import { testId } from '../../fixtures/fakes.js';

const input = (overrides: Partial<CreateDocumentInput> = {}): CreateDocumentInput => ({
  name: 'CCIR 2024',
  kind: 'certificate',
  issuedOn: '2024-01-10',
  expiresOn: '2024-12-31',
  farmId: testId(10),
  ...overrides,
});

describe('normalizeAlertThresholds', () => {
  it('treats missing and empty lists as the default set', () => {
    expect(normalizeAlertThresholds(undefined)._unsafeUnwrap()).toBeNull();
    expect(normalizeAlertThresholds([])._unsafeUnwrap()).toBeNull();
  });

  it('removes duplicates and sorts largest first', () => {
    expect(normalizeAlertThresholds([7, 60, 7, 1])._unsafeUnwrap()).toEqual([60, 7, 1]);
  });

  it('rejects zero, fractions and values above ten years', () => {
    expect(normalizeAlertThresholds([0]).isErr()).toBe(true);
    expect(normalizeAlertThresholds([1.5]).isErr()).toBe(true);
    expect(normalizeAlertThresholds([3651]).isErr()).toBe(true);
  });
});

describe('validateDocumentInput', () => {
  it('applies defaults and cleans the recipient list', () => {
    const fields = validateDocumentInput(
      input({ alertEmails: ['A@example.com', 'a@example.com', 'not-an-email'] })
    )._unsafeUnwrap();

    expect(fields).toEqual({
      name: 'CCIR 2024',
      kind: 'certificate',
      customKind: null,
      issuedOn: '2024-01-10',
      expiresOn: '2024-12-31',
      farmId: testId(10),
      personId: null,
      alertEmails: ['A@example.com'],
      alertThresholds: null,
      alertsEnabled: true,
    });
  });

  it('accepts documents that never expire', () => {
    expect(validateDocumentInput(input({ expiresOn: null }))._unsafeUnwrap().expiresOn).toBeNull();
  });

  it('requires a custom kind for "other" and drops it for known kinds', () => {
    expect(validateDocumentInput(input({ kind: 'other' }))._unsafeUnwrapErr().field).toBe(
      'customKind'
    );
    expect(
      validateDocumentInput(input({ kind: 'other', customKind: ' Outorga ' }))._unsafeUnwrap()
        .customKind
    ).toBe('Outorga');
    expect(
      validateDocumentInput(input({ customKind: 'ignored' }))._unsafeUnwrap().customKind
    ).toBeNull();
  });

  it('rejects unknown kinds and invalid dates', () => {
    expect(validateDocumentInput(input({ kind: 'deed' }))._unsafeUnwrapErr().field).toBe('kind');
    expect(validateDocumentInput(input({ issuedOn: '2024-02-30' }))._unsafeUnwrapErr().field).toBe(
      'issuedOn'
    );
    expect(validateDocumentInput(input({ expiresOn: 'soon' }))._unsafeUnwrapErr().field).toBe(
      'expiresOn'
    );
  });

  it('requires a farm or a person', () => {
    expect(
      validateDocumentInput(input({ farmId: null, personId: null }))._unsafeUnwrapErr().message
    ).toBe('A document needs a farm or a responsible person');
  });
});
