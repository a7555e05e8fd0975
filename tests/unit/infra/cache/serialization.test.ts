import { describe, expect, it } from 'vitest';

import { deserialize, serialize } from '@/infra/cache/serialization.js';

describe('Cache Serialization', () => {
  describe('serialize', () => {
    it('serializes primitive values', () => {
      expect(serialize('hello')._unsafeUnwrap()).toBe('"hello"');
      expect(serialize(42)._unsafeUnwrap()).toBe('42');
      expect(serialize(true)._unsafeUnwrap()).toBe('true');
      expect(serialize(null)._unsafeUnwrap()).toBe('null');
    });

    it('serializes objects', () => {
      expect(serialize({ name: 'test', value: 123 })._unsafeUnwrap()).toBe(
        '{"name":"test","value":123}'
      );
    });

    it('rejects undefined', () => {
      const result = serialize(undefined);
      expect(result._unsafeUnwrapErr()).toEqual({
        type: 'SerializationError',
        message: 'Value is not JSON-serializable',
        cause: undefined,
      });
    });

    it('rejects values JSON cannot encode', () => {
      const result = serialize({ big: 1n });
      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe('Failed to serialize cache value');
    });
  });

  describe('deserialize', () => {
    it('parses JSON values', () => {
      expect(deserialize('{"total":3,"items":[]}')._unsafeUnwrap()).toEqual({
        total: 3,
        items: [],
      });
    });

    it('returns a serialization error for invalid JSON', () => {
      const result = deserialize('{not json');
      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().type).toBe('SerializationError');
    });
  });
});
