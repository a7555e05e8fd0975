/**
 * Glob matching compatible with Redis `SCAN MATCH` for the subset we use:
 * `*` matches any run of characters, `?` matches exactly one, `\` escapes.
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;

export const globToRegExp = (pattern: string): RegExp => {
  let source = '';
  let escaped = false;

  for (const char of pattern) {
    if (escaped) {
      source += char.replace(REGEX_SPECIALS, '\\$&');
      escaped = false;
    } else if (char === '\\') {
      escaped = true;
    } else if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(REGEX_SPECIALS, '\\$&');
    }
  }

  if (escaped) {
    source += '\\\\';
  }

  return new RegExp(`^${source}$`, 's');
};

export const matchesGlob = (pattern: string, key: string): boolean =>
  globToRegExp(pattern).test(key);
