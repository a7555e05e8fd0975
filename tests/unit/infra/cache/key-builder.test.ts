import { describe, expect, it } from 'vitest';

import { CacheNamespace, createKeyBuilder } from '@/infra/cache/key-builder.js';

describe('KeyBuilder', () => {
  it('joins namespace and parts with colons', () => {
    const builder = createKeyBuilder();
    expect(builder.build(CacheNamespace.PEOPLE, 'search', 'ana', 1, 10)).toBe(
      'people:search:ana:1:10'
    );
  });

  it('builds a bare namespace key when no parts are given', () => {
    const builder = createKeyBuilder();
    expect(builder.build(CacheNamespace.DASHBOARD)).toBe('dashboard');
  });

  it('returns a glob pattern covering the namespace', () => {
    const builder = createKeyBuilder();
    expect(builder.pattern(CacheNamespace.DEADLINES)).toBe('deadlines:*');
  });

  describe('CacheNamespace', () => {
    it('has expected namespace values', () => {
      expect(Object.values(CacheNamespace)).toEqual([
        'people',
        'farms',
        'documents',
        'debts',
        'deadlines',
        'alerts',
        'dashboard',
      ]);
    });
  });
});
