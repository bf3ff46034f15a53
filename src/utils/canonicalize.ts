const canonicalizeCache = new Map<string, string>();
const CACHE_LIMIT = 10_000;

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

/**
 * Comparison form of a free-text value: NFKD folded, diacritics and
 * punctuation removed, lower case, single spaces.
 */
export function canonicalize(input: string): string {
  if (!input) return '';

  const cached = canonicalizeCache.get(input);
  if (cached !== undefined) {
    return cached;
  }

  let normalized = input.normalize('NFKD');
  normalized = normalized.replace(/[\u0300-\u036f]/g, '');
  normalized = normalized.toLowerCase();
  normalized = normalized.replace(/[\u2010-\u2015]/g, ' ');
  normalized = normalized.replace(/[^\p{L}\p{N}\s]/gu, ' ');
  const result = collapseWhitespace(normalized);

  if (canonicalizeCache.size >= CACHE_LIMIT) {
    canonicalizeCache.clear();
  }
  canonicalizeCache.set(input, result);
  return result;
}
