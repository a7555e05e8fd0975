import { describe, expect, it } from 'vitest';

import {
  createDocument,
  deleteDocument,
  getDocument,
  listDocuments,
  updateDocument,
} from '@/modules/documents/index.js';

import {
  makeFakeDocumentsRepo,
  makeLedgerDocument,
  makeRecordingInvalidator,
  testId,
} from '../../fixtures/fakes.js';

const farmId = testId(10);

describe('createDocument', () => {
  it('stores the document and invalidates document caches', async () => {
    const documentsRepo = makeFakeDocumentsRepo();
    const cacheInvalidator = makeRecordingInvalidator();

    const result = await createDocument(
      { documentsRepo, cacheInvalidator },
      { name: 'ITR', kind: 'certificate', issuedOn: '2024-03-01', farmId, alertThresholds: [10] }
    );

    expect(result._unsafeUnwrap()).toMatchObject({ name: 'ITR', alertThresholds: [10] });
    expect(cacheInvalidator.invalidated).toEqual(['document']);
  });

  it('does not invalidate when validation fails', async () => {
    const cacheInvalidator = makeRecordingInvalidator();

    const result = await createDocument(
      { documentsRepo: makeFakeDocumentsRepo(), cacheInvalidator },
      { name: ' ', kind: 'certificate', issuedOn: '2024-03-01', farmId }
    );

    expect(result._unsafeUnwrapErr().type).toBe('ValidationError');
    expect(cacheInvalidator.invalidated).toEqual([]);
  });
});

describe('updateDocument', () => {
  it('merges the changes with the stored document', async () => {
    const existing = makeLedgerDocument({ id: testId(20), alertEmails: ['a@example.com'] });
    const documentsRepo = makeFakeDocumentsRepo([existing]);
    const cacheInvalidator = makeRecordingInvalidator();

    const result = await updateDocument(
      { documentsRepo, cacheInvalidator },
      { id: existing.id, updates: { alertsEnabled: false } }
    );

    expect(result._unsafeUnwrap()).toMatchObject({
      alertsEnabled: false,
      alertEmails: ['a@example.com'],
      expiresOn: existing.expiresOn,
    });
    expect(cacheInvalidator.invalidated).toEqual(['document']);
  });

  it('returns not found for unknown documents', async () => {
    const result = await updateDocument(
      { documentsRepo: makeFakeDocumentsRepo(), cacheInvalidator: makeRecordingInvalidator() },
      { id: testId(99), updates: {} }
    );

    expect(result._unsafeUnwrapErr().type).toBe('DocumentNotFoundError');
  });
});

describe('getDocument and deleteDocument', () => {
  it('return not found for unknown documents', async () => {
    const documentsRepo = makeFakeDocumentsRepo();

    const found = await getDocument({ documentsRepo }, { id: testId(99) });
    const deleted = await deleteDocument(
      { documentsRepo, cacheInvalidator: makeRecordingInvalidator() },
      { id: testId(99) }
    );

    expect(found._unsafeUnwrapErr().type).toBe('DocumentNotFoundError');
    expect(deleted._unsafeUnwrapErr().type).toBe('DocumentNotFoundError');
  });
});

describe('listDocuments', () => {
  const documents = [
    makeLedgerDocument({ id: testId(21), expiresOn: '2024-06-10' }),
    makeLedgerDocument({ id: testId(22), expiresOn: '2024-08-01' }),
    makeLedgerDocument({ id: testId(23), expiresOn: null }),
  ];

  it('filters documents expiring within the window', async () => {
    const result = await listDocuments(
      { documentsRepo: makeFakeDocumentsRepo(documents) },
      { today: '2024-06-01', expiringWithinDays: 30 }
    );

    expect(result._unsafeUnwrap().items.map((document) => document.id)).toEqual([testId(21)]);
  });

  it('rejects a negative window', async () => {
    const result = await listDocuments(
      { documentsRepo: makeFakeDocumentsRepo(documents) },
      { today: '2024-06-01', expiringWithinDays: -1 }
    );

    expect(result._unsafeUnwrapErr().type).toBe('ValidationError');
  });

  it('lists everything without filters', async () => {
    const result = await listDocuments(
      { documentsRepo: makeFakeDocumentsRepo(documents) },
      { today: '2024-06-01' }
    );

    expect(result._unsafeUnwrap().total).toBe(3);
  });
});
