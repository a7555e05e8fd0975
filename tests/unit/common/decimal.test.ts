import { describe, expect, it } from 'vitest';

import { parseDecimal } from '@/common/decimal.js';

describe('parseDecimal', () => {
  it('parses decimal strings exactly', () => {
    expect(parseDecimal('0.1')?.plus('0.2').toString()).toBe('0.3');
    expect(parseDecimal(42)?.toString()).toBe('42');
  });

  it('returns null for text and non-finite values', () => {
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
    expect(parseDecimal('')).toBeNull();
  });
});
