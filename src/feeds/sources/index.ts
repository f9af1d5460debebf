/**
 * DealScout — Deal Sources Index
 *
 * Builds the configured sources and registers them in run order:
 * EDGAR (when enabled), Bing News, GDELT, then generic RSS feeds.
 */

import type { AppConfig } from '../../config/env';
import type { Vocabulary } from '../../config/vocabulary';
import { clearSources, registerSource, type DealSource } from '../base';
import { SecEdgarSource } from './sec-edgar';
import { BingNewsSource } from './bing-news';
import { GdeltSource } from './gdelt';
import { RssFeedSource } from './rss';

export { SecEdgarSource } from './sec-edgar';
export { BingNewsSource, freshnessForWindow } from './bing-news';
export { GdeltSource } from './gdelt';
export { RssFeedSource } from './rss';

/**
 * Instantiate every source the configuration enables.
 */
export function buildSources(config: AppConfig, vocabulary?: Vocabulary): DealSource[] {
  const shared = {
    vocabulary,
    timeoutMs: config.http.timeoutMs,
    userAgent: config.http.userAgent,
  };

  const sources: DealSource[] = [];

  // Off by default: the raw filing stream is noisy without a curated company list
  if (config.edgar.enabled) {
    sources.push(new SecEdgarSource({ ...shared, feeds: config.edgar.feeds }));
  }

  sources.push(new BingNewsSource({
    ...shared,
    apiKey: config.bing.apiKey,
    endpoint: config.bing.endpoint,
    queryDelayMs: config.bing.queryDelayMs,
  }));

  sources.push(new GdeltSource({
    ...shared,
    endpoint: config.gdelt.endpoint,
    backoffMinMs: config.gdelt.backoffMinMs,
    backoffMaxMs: config.gdelt.backoffMaxMs,
  }));

  sources.push(new RssFeedSource({ ...shared, feeds: config.rssFeeds }));

  return sources;
}

/**
 * Replace the registry contents with the configured sources.
 */
export function registerDefaultSources(config: AppConfig, vocabulary?: Vocabulary): DealSource[] {
  clearSources();
  const sources = buildSources(config, vocabulary);
  sources.forEach(registerSource);
  return sources;
}
