/**
 * DealScout — Syndication Source Base
 *
 * Shared plumbing for sources that read RSS/Atom documents:
 * fetch with per-feed isolation, parse, and the timestamp/window rule.
 */

import type { FeedEntry } from '../types';
import { DealSource } from './base';
import { parseFeed } from './feed-parser';
import { isWithinWindow, parseTimestamp, resolveEntryTimestamp } from './normalizer';
import { httpGet } from '../lib/http';

export abstract class SyndicationSource extends DealSource {
  readonly fetchMethod = 'rss' as const;

  /**
   * Fetch and parse one feed. Network errors, non-2xx statuses and
   * unreadable documents skip the feed and return no entries.
   */
  protected async readFeed(feedUrl: string): Promise<FeedEntry[]> {
    const outcome = await httpGet(feedUrl, {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      headers: { Accept: 'application/atom+xml, application/rss+xml, application/xml, text/xml, */*' },
    });

    if (outcome.kind === 'failure') {
      this.logger.warn('Feed request failed, skipping', { feedUrl, error: outcome.reason });
      return [];
    }

    if (outcome.status < 200 || outcome.status >= 300) {
      this.logger.warn('Feed returned non-success status, skipping', {
        feedUrl,
        status: outcome.status,
      });
      return [];
    }

    const entries = parseFeed(outcome.body);
    this.logger.debug('Feed parsed', { feedUrl, entries: entries.length });
    return entries;
  }

  /**
   * Publication instant of an entry, or null when the entry must be dropped:
   * no timestamp, an unparseable one, or one older than the window.
   */
  protected entryPublishedAt(entry: FeedEntry, windowDays: number): Date | null {
    const raw = resolveEntryTimestamp(entry);
    if (!raw) return null;

    const publishedAt = parseTimestamp(raw);
    if (!publishedAt) {
      this.logger.debug('Unparseable entry timestamp, skipping', { raw, title: entry.title });
      return null;
    }

    return isWithinWindow(publishedAt, windowDays, this.now()) ? publishedAt : null;
  }
}
