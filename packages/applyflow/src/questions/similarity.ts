import { createHash } from 'node:crypto';

/**
 * Lowercase, split hyphenated and underscored words, strip punctuation,
 * collapse whitespace.
 *
 *   normalizeText('  Years of  Experience? ') -> 'years of experience'
 *   normalizeText('Full-time role')           -> 'full time role'
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[-_]+/g, ' ')
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalize a form label that may be an identifier: camelCase, snake_case
 * and kebab-case are split into words first.
 *
 *   normalizeLabel('firstName')  -> 'first name'
 *   normalizeLabel('last_name')  -> 'last name'
 */
export function normalizeLabel(label: string): string {
  return normalizeText(
    label
      .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
      .replace(/[_\-.]+/g, ' '),
  );
}

export function tokenSet(normalized: string): Set<string> {
  return new Set(normalized.split(' ').filter(Boolean));
}

/**
 * Jaccard similarity of the token sets of two already-normalized strings.
 * Empty input on either side scores 0.
 */
export function jaccard(a: string, b: string): number {
  const ta = tokenSet(a);
  const tb = tokenSet(b);
  if (ta.size === 0 || tb.size === 0) return 0;

  let intersection = 0;
  for (const token of ta) {
    if (tb.has(token)) intersection += 1;
  }
  const union = ta.size + tb.size - intersection;
  return intersection / union;
}

/** Stable 16-hex-char hash of normalized question text. */
export function fingerprint(normalized: string): string {
  return createHash('sha256').update(normalized).digest('hex').slice(0, 16);
}
