/**
 * DealScout — Relevance Gates
 *
 * Keyword co-occurrence checks deciding whether an upstream item is kept.
 */

import { DEFAULT_VOCABULARY } from '../config/vocabulary';

function includesAnyTerm(lowerText: string, terms: readonly string[]): boolean {
  return terms.some(term => lowerText.includes(term.toLowerCase()));
}

/**
 * True when the text mentions at least one topic term AND at least one deal term.
 * Gate for generic feeds, where most items are off-topic.
 */
export function matchesTopic(
  text: string,
  topicTerms: readonly string[] = DEFAULT_VOCABULARY.cannabisTerms,
  dealTerms: readonly string[] = DEFAULT_VOCABULARY.dealTerms
): boolean {
  const low = (text || '').toLowerCase();
  return includesAnyTerm(low, topicTerms) && includesAnyTerm(low, dealTerms);
}

export function hasDealKeyword(
  text: string,
  dealTerms: readonly string[] = DEFAULT_VOCABULARY.dealTerms
): boolean {
  return includesAnyTerm((text || '').toLowerCase(), dealTerms);
}

/**
 * Soft cannabis hint: any root form (cannab, marij, hemp...) anywhere in the text.
 * Filing summaries are too sparse for full co-occurrence.
 */
export function hasCannabisHint(
  text: string,
  roots: readonly string[] = DEFAULT_VOCABULARY.cannabisHintRoots
): boolean {
  return includesAnyTerm((text || '').toLowerCase(), roots);
}
