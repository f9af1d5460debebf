/**
 * DealScout — GDELT Source
 *
 * Long-tail news from the GDELT DOC 2.0 article search: one broad boolean
 * query over the lookback window. The API rate-limits aggressively, so a
 * 429 gets one retry after a jittered backoff; anything else that is not a
 * readable 200 yields an empty list.
 */

import { z } from 'zod';
import type { DealRecord, DealSourceName, SourceKind } from '../../types';
import { DealSource, type DealSourceOptions } from '../base';
import { buildDealRecord, parseTimestamp, windowStart } from '../normalizer';
import { httpGet, jitteredDelay, parseJson, sleep, type HttpOutcome } from '../../lib/http';
import { GDELT_DEFAULT_ENDPOINT } from '../../config/env';

const GdeltArticleSchema = z.object({
  url: z.string().nullish(),
  title: z.string().nullish(),
  seendate: z.string().nullish(),
  domain: z.string().nullish(),
});

// An empty result set comes back as "{}"
const GdeltResponseSchema = z.object({
  articles: z.array(GdeltArticleSchema).nullish(),
});

export interface GdeltSourceOptions extends DealSourceOptions {
  endpoint?: string;
  query?: string;
  maxRecords?: number;
  backoffMinMs?: number;
  backoffMaxMs?: number;
  /** Random source for the backoff jitter, in [0, 1) */
  random?: () => number;
}

export class GdeltSource extends DealSource {
  readonly name: DealSourceName = 'gdelt';
  readonly kind: SourceKind = 'news';
  readonly label = 'GDELT';
  readonly fetchMethod = 'api' as const;

  private readonly endpoint: string;
  private readonly query: string;
  private readonly maxRecords: number;
  private readonly backoffMinMs: number;
  private readonly backoffMaxMs: number;
  private readonly random: () => number;

  constructor(options: GdeltSourceOptions = {}) {
    super(options);
    this.endpoint = options.endpoint ?? GDELT_DEFAULT_ENDPOINT;
    this.query = options.query ?? this.vocabulary.gdeltQuery;
    this.maxRecords = options.maxRecords ?? 250;
    this.backoffMinMs = options.backoffMinMs ?? 5_000;
    this.backoffMaxMs = options.backoffMaxMs ?? 9_000;
    this.random = options.random ?? Math.random;
  }

  async fetch(windowDays: number): Promise<DealRecord[]> {
    let outcome = await this.request(windowDays);

    if (outcome.kind === 'response' && outcome.status === 429) {
      const waitMs = jitteredDelay(this.backoffMinMs, this.backoffMaxMs, this.random);
      this.logger.warn('GDELT rate limited, retrying once', { waitMs });
      await sleep(waitMs);
      outcome = await this.request(windowDays);
    }

    if (outcome.kind === 'failure') {
      this.logger.warn('GDELT request failed', { error: outcome.reason });
      return [];
    }

    if (outcome.status !== 200) {
      this.logger.warn('GDELT returned non-200', {
        status: outcome.status,
        body: outcome.body.slice(0, 200),
      });
      return [];
    }

    // Query syntax errors come back as 200 with a plain-text message
    const parsed = parseJson(outcome.body, GdeltResponseSchema);
    if (!parsed.ok) {
      this.logger.warn('GDELT response unreadable', { error: parsed.error });
      return [];
    }

    const since = windowStart(windowDays, this.now());
    const out: DealRecord[] = [];

    for (const article of parsed.value.articles ?? []) {
      const seen = parseTimestamp(article.seendate);
      if (seen && seen.getTime() < since.getTime()) continue;

      const title = article.title ?? '';
      out.push(buildDealRecord({
        source: article.domain ? `${this.label} (${article.domain})` : this.label,
        sourceKind: this.kind,
        publishedAt: seen ?? this.now(),
        title,
        url: article.url ?? '',
        // Article lists carry no description; the headline is the evidence
        snippet: title,
      }, this.vocabulary));
    }

    return out;
  }

  private request(windowDays: number): Promise<HttpOutcome> {
    return httpGet(this.endpoint, {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      params: {
        query: this.query,
        mode: 'ArtList',
        format: 'json',
        maxrecords: this.maxRecords,
        sort: 'DateDesc',
        timespan: `${windowDays}d`,
      },
    });
  }
}
