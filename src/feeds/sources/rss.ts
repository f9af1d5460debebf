/**
 * DealScout — Generic RSS Source
 *
 * Iterates operator-supplied RSS/Atom feeds. Items must mention both a
 * cannabis term and a deal term to be kept. An empty feed list is valid.
 */

import type { DealRecord, DealSourceName, SourceKind } from '../../types';
import type { DealSourceOptions } from '../base';
import { SyndicationSource } from '../syndication';
import { buildDealRecord } from '../normalizer';
import { matchesTopic } from '../../matching/relevance';
import { normalize } from '../../lib/text';

export class RssFeedSource extends SyndicationSource {
  readonly name: DealSourceName = 'rss_feeds';
  readonly kind: SourceKind = 'news';
  readonly label = 'RSS';

  private readonly feeds: string[];

  constructor(options: DealSourceOptions & { feeds?: string[] } = {}) {
    super(options);
    this.feeds = options.feeds ?? [];
  }

  async fetch(windowDays: number): Promise<DealRecord[]> {
    if (this.feeds.length === 0) {
      this.logger.debug('No RSS feeds configured');
      return [];
    }

    const out: DealRecord[] = [];

    for (const feedUrl of this.feeds) {
      const entries = await this.readFeed(feedUrl);

      for (const entry of entries) {
        const publishedAt = this.entryPublishedAt(entry, windowDays);
        if (!publishedAt) continue;

        const blob = `${normalize(entry.title)} ${normalize(entry.summary)}`;
        if (!matchesTopic(blob, this.vocabulary.cannabisTerms, this.vocabulary.dealTerms)) continue;

        out.push(buildDealRecord({
          source: `RSS (${feedUrl})`,
          sourceKind: this.kind,
          publishedAt,
          title: entry.title,
          url: entry.link,
          summary: entry.summary,
        }, this.vocabulary));
      }
    }

    return out;
  }
}
