/**
 * DealScout — Feeds Module
 *
 * Multi-source ingestion: sources, normalization, dedup and ranking.
 */

export {
  DealSource,
  registerSource,
  getAllSources,
  getSource,
  clearSources,
  type DealSourceOptions,
  type DealSourceRun,
} from './base';

export { SyndicationSource } from './syndication';

export { parseFeed, decodeXmlEntities } from './feed-parser';

export {
  buildDealRecord,
  parseTimestamp,
  isWithinWindow,
  windowStart,
  resolveEntryTimestamp,
  SNIPPET_MAX_LENGTH,
  type DealRecordInput,
} from './normalizer';

export { deduplicate, type DedupResult } from './dedup';

export { rankByRecency } from './ranker';

export {
  aggregateDeals,
  DEFAULT_WINDOW_DAYS,
  type AggregatorConfig,
  type AggregatorResult,
} from './aggregator';

export {
  SecEdgarSource,
  BingNewsSource,
  GdeltSource,
  RssFeedSource,
  freshnessForWindow,
  buildSources,
  registerDefaultSources,
} from './sources';
