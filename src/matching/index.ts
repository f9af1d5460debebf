/**
 * DealScout — Matching
 *
 * Keyword relevance gates and the per-record classifiers.
 */

export {
  classifyDealType,
  extractAmount,
  extractEntities,
  ENTITIES_MAX_LENGTH,
} from './classifiers';

export { matchesTopic, hasDealKeyword, hasCannabisHint } from './relevance';
