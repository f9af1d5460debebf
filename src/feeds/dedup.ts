/**
 * DealScout — Deal Deduplication
 *
 * Merges records across sources by exact URL and normalized title.
 * Single pass, first occurrence wins, input order preserved.
 */

import type { DealRecord } from '../types';
import { normalizeTitleKey } from '../lib/text';

/**
 * Result of deduplication process.
 */
export interface DedupResult {
  records: DealRecord[];
  duplicateCount: number;
  totalProcessed: number;
}

/**
 * Drop a record when its non-empty URL or its non-empty title key was already seen.
 * Records with neither key cannot collide and are always kept.
 */
export function deduplicate(records: readonly DealRecord[]): DedupResult {
  const seenUrls = new Set<string>();
  const seenTitles = new Set<string>();
  const kept: DealRecord[] = [];

  for (const record of records) {
    const url = record.url.trim();
    const titleKey = normalizeTitleKey(record.title);

    if (url && seenUrls.has(url)) continue;
    if (titleKey && seenTitles.has(titleKey)) continue;

    if (url) seenUrls.add(url);
    if (titleKey) seenTitles.add(titleKey);
    kept.push(record);
  }

  return {
    records: kept,
    duplicateCount: records.length - kept.length,
    totalProcessed: records.length,
  };
}
