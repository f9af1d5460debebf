/**
 * DealScout — Deal Record Types v1.0
 *
 * Canonical records produced by every deal source.
 * All upstream items are normalized to this format before dedup and ranking.
 */

// ============================================================
// ENUMERATIONS
// ============================================================

export type DealType =
  | 'M&A'
  | 'Capital Raise'
  | 'Debt'
  | 'Other';

/**
 * Kind of upstream item. `edgar` marks a regulatory filing.
 */
export type SourceKind = 'edgar' | 'news';

export type DealSourceName =
  | 'sec_edgar'    // SEC EDGAR current-filings Atom feeds
  | 'bing_news'    // Bing News Search (keyword API, primary)
  | 'gdelt'        // GDELT DOC 2.0 article search (long tail)
  | 'rss_feeds';   // Operator-supplied syndication feeds

export const DEAL_SOURCE_NAMES: readonly DealSourceName[] = [
  'sec_edgar',
  'bing_news',
  'gdelt',
  'rss_feeds',
] as const;

// ============================================================
// DEAL RECORD
// ============================================================

/**
 * One candidate transaction mention.
 * Constructed once inside its source and never mutated afterwards.
 */
export interface DealRecord {
  /** Human-readable origin label, e.g. "SEC EDGAR" or "RSS (https://...)" */
  readonly source: string;
  readonly sourceKind: SourceKind;
  /** ISO-8601 UTC instant */
  readonly publishedAt: string;
  readonly title: string;
  /** May be empty for malformed upstream entries */
  readonly url: string;
  readonly dealType: DealType;
  /** "Party A | Party B", or the cleaned title when no split phrase matches */
  readonly entities: string;
  /** "$50M", "$1.2B", "$300" or "" */
  readonly amount: string;
  readonly snippet: string;
}

// ============================================================
// UPSTREAM ITEMS
// ============================================================

/**
 * One entry of an RSS or Atom feed. Every field is optional;
 * the timestamp is the first present of `published`, `updated`.
 */
export interface FeedEntry {
  title?: string;
  link?: string;
  summary?: string;
  published?: string;
  updated?: string;
}

// ============================================================
// FETCH RESULTS
// ============================================================

/**
 * Outcome of one source run. `error` is captured for logging only.
 */
export interface SourceFetchResult {
  sourceName: DealSourceName;
  label: string;
  success: boolean;
  recordCount: number;
  durationMs: number;
  fetchedAt: string;
  error?: string;
}
