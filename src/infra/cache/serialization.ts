/**
 * JSON serialization for cache values.
 */

import { err, ok, type Result } from 'neverthrow';

import { CacheError } from './ports.js';

/**
 * Serialize a value to a JSON string.
 */
export const serialize = (value: unknown): Result<string, CacheError> => {
  try {
    const json = JSON.stringify(value);
    if (json === undefined) {
      return err(CacheError.serialization('Value is not JSON-serializable'));
    }
    return ok(json);
  } catch (cause) {
    return err(CacheError.serialization('Failed to serialize cache value', cause));
  }
};

/**
 * Deserialize a JSON string.
 */
export const deserialize = (json: string): Result<unknown, CacheError> => {
  try {
    const value: unknown = JSON.parse(json);
    return ok(value);
  } catch (cause) {
    return err(CacheError.serialization('Failed to deserialize cached value', cause));
  }
};
