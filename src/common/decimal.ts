import { Decimal } from 'decimal.js';

/**
 * Parses a decimal string, returning null for anything decimal.js rejects
 * or that is not finite.
 */
export const parseDecimal = (value: string | number): Decimal | null => {
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null;
  }
};
