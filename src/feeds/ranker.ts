/**
 * DealScout — Ranker
 *
 * Orders the deduplicated collection newest first.
 */

import type { DealRecord } from '../types';
import { parseTimestamp } from './normalizer';

function sortKey(record: DealRecord): number {
  // Unparseable timestamps rank as 1970-01-01T00:00:00Z
  return parseTimestamp(record.publishedAt)?.getTime() ?? 0;
}

/**
 * Sort by publishedAt descending. Array.prototype.sort is stable,
 * so ties keep their input order. Returns a new array.
 */
export function rankByRecency(records: readonly DealRecord[]): DealRecord[] {
  return records
    .map(record => ({ record, key: sortKey(record) }))
    .sort((a, b) => b.key - a.key)
    .map(entry => entry.record);
}
