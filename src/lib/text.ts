/**
 * DealScout — Text Normalization
 *
 * Whitespace collapsing and key folding shared by every stage.
 */

/**
 * Collapse every whitespace run to a single space and trim both ends.
 * Absent input yields an empty string.
 */
export function normalize(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Lower-case and drop everything outside [a-z0-9].
 * "Deal Closes!" and "deal closes" share the key "dealcloses".
 */
export function normalizeTitleKey(title: string | null | undefined): string {
  return (title ?? '').toLowerCase().replace(/[^a-z0-9]+/g, '');
}

/**
 * Hard-cut to `max` characters. The cut may expose a space, so the end is trimmed again.
 */
export function truncate(text: string, max: number): string {
  return text.slice(0, max).trimEnd();
}
