/**
 * DealScout — Bing News Source
 *
 * Primary news source. Runs pre-built topical queries (deal by type and
 * deal by region) against the Bing News Search API, one at a time with a
 * fixed politeness delay. Requires BING_NEWS_KEY; without it the source
 * logs a warning and returns nothing.
 */

import { z } from 'zod';
import type { DealRecord, DealSourceName, SourceKind } from '../../types';
import { DealSource, type DealSourceOptions } from '../base';
import { buildDealRecord, parseTimestamp, windowStart } from '../normalizer';
import { deduplicate } from '../dedup';
import { httpGet, parseJson, sleep } from '../../lib/http';
import { BING_DEFAULT_ENDPOINT } from '../../config/env';

const BingArticleSchema = z.object({
  name: z.string().nullish(),
  url: z.string().nullish(),
  description: z.string().nullish(),
  datePublished: z.string().nullish(),
});

const BingResponseSchema = z.object({
  value: z.array(BingArticleSchema).nullish(),
});

type BingArticle = z.infer<typeof BingArticleSchema>;

export type BingFreshness = 'Day' | 'Week' | 'Month';

/**
 * Smallest Bing freshness bucket that covers the window.
 * Items older than the window are still filtered client-side.
 */
export function freshnessForWindow(windowDays: number): BingFreshness {
  if (windowDays <= 1) return 'Day';
  if (windowDays <= 7) return 'Week';
  return 'Month';
}

export interface BingNewsSourceOptions extends DealSourceOptions {
  apiKey?: string;
  endpoint?: string;
  /** Pause between consecutive queries */
  queryDelayMs?: number;
  /** Overrides the vocabulary's query list */
  queries?: string[];
}

export class BingNewsSource extends DealSource {
  readonly name: DealSourceName = 'bing_news';
  readonly kind: SourceKind = 'news';
  readonly label = 'Bing News';
  readonly fetchMethod = 'api' as const;

  private readonly apiKey?: string;
  private readonly endpoint: string;
  private readonly queryDelayMs: number;
  private readonly queries: string[];

  constructor(options: BingNewsSourceOptions = {}) {
    super(options);
    this.apiKey = options.apiKey?.trim() || undefined;
    this.endpoint = options.endpoint ?? BING_DEFAULT_ENDPOINT;
    this.queryDelayMs = options.queryDelayMs ?? 350;
    this.queries = options.queries ?? this.vocabulary.bingQueries;
  }

  async fetch(windowDays: number): Promise<DealRecord[]> {
    if (!this.apiKey) {
      this.logger.warn('BING_NEWS_KEY is missing; returning empty list');
      return [];
    }

    const since = windowStart(windowDays, this.now());
    const out: DealRecord[] = [];

    for (const [index, query] of this.queries.entries()) {
      if (index > 0) {
        await sleep(this.queryDelayMs);
      }

      const articles = await this.runQuery(this.apiKey, query, windowDays);

      for (const article of articles) {
        const parsed = parseTimestamp(article.datePublished);
        if (parsed && parsed.getTime() < since.getTime()) continue;

        out.push(buildDealRecord({
          source: this.label,
          sourceKind: this.kind,
          // Missing or unparseable dates fall back to ingestion time
          publishedAt: parsed ?? this.now(),
          title: article.name ?? '',
          url: article.url ?? '',
          summary: article.description ?? '',
        }, this.vocabulary));
      }
    }

    // Queries overlap, so the same article can come back more than once
    const deduped = deduplicate(out);
    this.logger.info('Bing queries completed', {
      queries: this.queries.length,
      records: deduped.records.length,
      duplicates: deduped.duplicateCount,
    });

    return deduped.records;
  }

  /**
   * Run one query. Transport failures, non-200 statuses and malformed
   * bodies skip the query and yield no articles.
   */
  private async runQuery(apiKey: string, query: string, windowDays: number): Promise<BingArticle[]> {
    const outcome = await httpGet(this.endpoint, {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      headers: { 'Ocp-Apim-Subscription-Key': apiKey },
      params: {
        q: query,
        count: 50,
        freshness: freshnessForWindow(windowDays),
        sortBy: 'Date',
        textFormat: 'Raw',
        safeSearch: 'Off',
      },
    });

    if (outcome.kind === 'failure') {
      this.logger.warn('Bing request failed, skipping query', { query, error: outcome.reason });
      return [];
    }

    this.logger.debug('Bing status', { status: outcome.status });

    if (outcome.status !== 200) {
      this.logger.warn('Bing returned non-200, skipping query', {
        query,
        status: outcome.status,
        body: outcome.body.slice(0, 200),
      });
      return [];
    }

    const parsed = parseJson(outcome.body, BingResponseSchema);
    if (!parsed.ok) {
      this.logger.warn('Bing response unreadable, skipping query', { query, error: parsed.error });
      return [];
    }

    return parsed.value.value ?? [];
  }
}
