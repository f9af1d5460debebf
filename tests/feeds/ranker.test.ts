/**
 * Tests for recency ranking
 */

import { describe, it, expect } from 'vitest';
import { rankByRecency } from '../../src/feeds/ranker';
import { makeRecord } from '../helpers/records';

describe('rankByRecency', () => {
  it('should sort newest first, keep ties stable and sink bad timestamps', () => {
    const older = makeRecord({ title: 'older', publishedAt: '2026-10-17T00:00:00.000Z' });
    const newestA = makeRecord({ title: 'newest a', publishedAt: '2026-10-19T00:00:00.000Z' });
    const bad = makeRecord({ title: 'bad', publishedAt: 'not-a-date' });
    const newestB = makeRecord({ title: 'newest b', publishedAt: '2026-10-19T00:00:00.000Z' });
    const input = [older, newestA, bad, newestB];

    const ranked = rankByRecency(input);

    expect(ranked.map(r => r.title)).toEqual(['newest a', 'newest b', 'older', 'bad']);
    expect(input.map(r => r.title)).toEqual(['older', 'newest a', 'bad', 'newest b']);
  });

  it('should return an empty list for no records', () => {
    expect(rankByRecency([])).toEqual([]);
  });
});
