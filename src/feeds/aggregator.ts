/**
 * DealScout — Deal Aggregator
 *
 * Orchestrates one pass of the ingestion pipeline:
 * 1. Fetch from each source in turn with the shared lookback window
 * 2. Concatenate their records
 * 3. Deduplicate across sources
 * 4. Rank newest first
 */

import type { DealRecord, DealSourceName, SourceFetchResult } from '../types';
import { getAllSources, type DealSource } from './base';
import { deduplicate } from './dedup';
import { rankByRecency } from './ranker';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorConfig {
  /** Lookback window in days (default: 7) */
  windowDays?: number;
  /** Which sources to fetch from (default: all) */
  sources?: DealSourceName[];
  /** Explicit source list (default: the registry) */
  sourceList?: DealSource[];
}

export interface AggregatorResult {
  /** Ranked, deduplicated records */
  records: DealRecord[];
  /** Per-source breakdown */
  sourceResults: SourceFetchResult[];
  /** Records returned by all sources before cross-source dedup */
  totalFetched: number;
  duplicatesRemoved: number;
  windowDays: number;
  durationMs: number;
  completedAt: string;
  /** Source failures, "<name>: <message>" */
  errors: string[];
}

export const DEFAULT_WINDOW_DAYS = 7;

/**
 * Filter sources based on config.
 */
function selectSources(config: AggregatorConfig): DealSource[] {
  const all = config.sourceList ?? getAllSources();
  if (!config.sources || config.sources.length === 0) return all;

  const wanted = new Set(config.sources);
  return all.filter(s => wanted.has(s.name));
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Run every selected source sequentially and merge the results.
 * Source failures are recorded, never thrown.
 */
export async function aggregateDeals(config: AggregatorConfig = {}): Promise<AggregatorResult> {
  const startTime = Date.now();
  const windowDays = config.windowDays ?? DEFAULT_WINDOW_DAYS;
  const sources = selectSources(config);

  logger.info('Starting deal aggregation', {
    windowDays,
    sources: sources.map(s => s.name),
  });

  if (sources.length === 0) {
    logger.warn('No sources to fetch from');
  }

  const collected: DealRecord[] = [];
  const sourceResults: SourceFetchResult[] = [];
  const errors: string[] = [];

  for (const source of sources) {
    const run = await source.safeFetch(windowDays);
    collected.push(...run.records);
    sourceResults.push(run.result);

    if (run.result.error) {
      errors.push(`${source.name}: ${run.result.error}`);
    }
  }

  const deduped = deduplicate(collected);
  const records = rankByRecency(deduped.records);
  const durationMs = Date.now() - startTime;

  logger.info('Deal aggregation completed', {
    fetched: collected.length,
    kept: records.length,
    duplicates: deduped.duplicateCount,
    durationMs,
    errors: errors.length,
  });

  return {
    records,
    sourceResults,
    totalFetched: collected.length,
    duplicatesRemoved: deduped.duplicateCount,
    windowDays,
    durationMs,
    completedAt: new Date().toISOString(),
    errors,
  };
}
