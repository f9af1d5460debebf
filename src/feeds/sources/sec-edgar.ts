/**
 * DealScout — SEC EDGAR Filing Source
 *
 * Reads the EDGAR "current filings" Atom feeds (8-K, S-4, SC 13D by default).
 * Filing summaries are sparse, so an entry passes with a deal keyword
 * OR a soft cannabis hint; it does not need both.
 */

import type { DealRecord, DealSourceName, SourceKind } from '../../types';
import type { DealSourceOptions } from '../base';
import { SyndicationSource } from '../syndication';
import { buildDealRecord } from '../normalizer';
import { hasCannabisHint, hasDealKeyword } from '../../matching/relevance';
import { DEFAULT_EDGAR_FEEDS } from '../../config/env';
import { normalize } from '../../lib/text';

export class SecEdgarSource extends SyndicationSource {
  readonly name: DealSourceName = 'sec_edgar';
  readonly kind: SourceKind = 'edgar';
  readonly label = 'SEC EDGAR';

  private readonly feeds: string[];

  constructor(options: DealSourceOptions & { feeds?: string[] } = {}) {
    super(options);
    this.feeds = options.feeds ?? [...DEFAULT_EDGAR_FEEDS];
  }

  async fetch(windowDays: number): Promise<DealRecord[]> {
    const out: DealRecord[] = [];

    for (const feedUrl of this.feeds) {
      const entries = await this.readFeed(feedUrl);

      for (const entry of entries) {
        const publishedAt = this.entryPublishedAt(entry, windowDays);
        if (!publishedAt) continue;

        const blob = `${normalize(entry.title)} ${normalize(entry.summary)}`;
        const relevant =
          hasDealKeyword(blob, this.vocabulary.dealTerms) ||
          hasCannabisHint(blob, this.vocabulary.cannabisHintRoots);
        if (!relevant) continue;

        out.push(buildDealRecord({
          source: this.label,
          sourceKind: this.kind,
          publishedAt,
          title: entry.title,
          url: entry.link,
          summary: entry.summary,
        }, this.vocabulary));
      }
    }

    this.logger.info('EDGAR filings matched', { feeds: this.feeds.length, records: out.length });
    return out;
  }
}
