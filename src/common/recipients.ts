/**
 * Email recipient list handling.
 */

const SEPARATORS = /[,;\n]/;

/**
 * Trims, keeps only addresses containing `@`, and drops case-insensitive
 * duplicates while preserving first-seen order.
 */
export const normalizeRecipients = (
  addresses: readonly (string | null | undefined)[]
): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of addresses) {
    if (raw === null || raw === undefined) continue;
    const address = raw.trim();
    if (!address.includes('@')) continue;

    const key = address.toLowerCase();
    if (seen.has(key)) continue;

    seen.add(key);
    result.push(address);
  }

  return result;
};

/**
 * Splits a free-form list ("a@x.com, b@y.com; c@z.com") and normalizes it.
 */
export const parseRecipientList = (text: string): string[] =>
  normalizeRecipients(text.split(SEPARATORS));
