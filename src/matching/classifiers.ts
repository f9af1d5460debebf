/**
 * DealScout — Deal Classifiers
 *
 * Deterministic keyword and regex heuristics, no network and no state.
 * Term sets are passed in explicitly and default to the bundled vocabulary.
 */

import type { DealType } from '../types';
import { DEFAULT_VOCABULARY, type DealTypeKeywords } from '../config/vocabulary';
import { normalize } from '../lib/text';

export const ENTITIES_MAX_LENGTH = 200;

// ============================================================
// DEAL TYPE
// ============================================================

function containsAny(haystack: string, terms: readonly string[]): boolean {
  return terms.some(term => haystack.includes(term.toLowerCase()));
}

/**
 * Classify a text blob into a coarse deal type.
 *
 * Groups are checked in precedence order M&A, Capital Raise, Debt, so
 * "acquisition financed by a term loan" stays M&A.
 */
export function classifyDealType(
  text: string,
  keywords: DealTypeKeywords = DEFAULT_VOCABULARY.dealTypeKeywords
): DealType {
  const t = (text || '').toLowerCase();

  if (containsAny(t, keywords.mergersAndAcquisitions)) return 'M&A';
  if (containsAny(t, keywords.capitalRaise)) return 'Capital Raise';
  if (containsAny(t, keywords.debt)) return 'Debt';
  return 'Other';
}

// ============================================================
// AMOUNT
// ============================================================

/**
 * Optional currency marker, a number (comma-grouped or plain, optional decimals)
 * and an optional scale word. Unmarked numbers must start on a word boundary
 * ("Q3" is not an amount) and not inside a decimal ("$.5", "v1.2"); scale words
 * must end on a word boundary ("$5 more" is not "$5M").
 */
const AMOUNT_RE =
  /(?:(\$|USD\s?)\s?|\b)(?<![\d.])([0-9]{1,3}(?:,[0-9]{3})+(?:\.[0-9]+)?|[0-9]+(?:\.[0-9]+)?)(?:\s?(million|billion|bn|m)\b)?/i;

/**
 * Extract the first monetary mention as "$<num>M", "$<num>B" or "$<num>".
 * Returns "" when the text has no number.
 */
export function extractAmount(text: string): string {
  const match = AMOUNT_RE.exec(text || '');
  if (!match) return '';

  const num = match[2];
  const scale = (match[3] ?? '').toLowerCase();

  if (scale === 'million' || scale === 'm') return `$${num}M`;
  if (scale === 'billion' || scale === 'bn') return `$${num}B`;
  return `$${num}`;
}

// ============================================================
// ENTITIES
// ============================================================

/**
 * Guess the counterparties from a headline.
 *
 * The first linking phrase found (in list order) splits the title into
 * "Left | Right". Without a phrase the cleaned title is returned.
 */
export function extractEntities(
  title: string,
  splitPhrases: readonly string[] = DEFAULT_VOCABULARY.entitySplitPhrases
): string {
  const t = title || '';
  const low = t.toLowerCase();

  for (const phrase of splitPhrases) {
    const needle = phrase.toLowerCase();
    const i = low.indexOf(needle);
    if (i === -1) continue;

    const left = normalize(t.slice(0, i));
    const right = normalize(t.slice(i + needle.length));
    return `${left} | ${right}`.slice(0, ENTITIES_MAX_LENGTH);
  }

  return normalize(t).slice(0, ENTITIES_MAX_LENGTH);
}
