/**
 * Tests for environment configuration
 */

import { describe, it, expect, vi } from 'vitest';
import {
  loadConfig,
  ConfigError,
  DEFAULT_EDGAR_FEEDS,
  DEFAULT_USER_AGENT,
  BING_DEFAULT_ENDPOINT,
  GDELT_DEFAULT_ENDPOINT,
} from '../../src/config/env';
import { BingNewsSource } from '../../src/feeds/sources/bing-news';
import { GdeltSource } from '../../src/feeds/sources/gdelt';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      bing: {
        apiKey: undefined,
        endpoint: 'https://api.bing.microsoft.com/v7.0/news/search',
        queryDelayMs: 350,
      },
      gdelt: {
        endpoint: 'https://api.gdeltproject.org/api/v2/doc/doc',
        backoffMinMs: 5000,
        backoffMaxMs: 9000,
      },
      edgar: {
        enabled: false,
        feeds: DEFAULT_EDGAR_FEEDS,
      },
      rssFeeds: [],
      http: {
        timeoutMs: 30000,
        userAgent: DEFAULT_USER_AGENT,
      },
      logLevel: 'info',
    });
  });

  it('should share endpoint defaults with the sources', async () => {
    const config = loadConfig({});
    expect(config.bing.endpoint).toBe(BING_DEFAULT_ENDPOINT);
    expect(config.gdelt.endpoint).toBe(GDELT_DEFAULT_ENDPOINT);

    const mockFetch = vi.fn(async (_url: string) => new Response('{}', { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);
    try {
      await new BingNewsSource({ apiKey: 'test-secret', queries: ['q'] }).fetch(7);
      await new GdeltSource().fetch(7);
    } finally {
      vi.unstubAllGlobals();
    }

    expect(mockFetch.mock.calls[0][0].startsWith(`${BING_DEFAULT_ENDPOINT}?`)).toBe(true);
    expect(mockFetch.mock.calls[1][0].startsWith(`${GDELT_DEFAULT_ENDPOINT}?`)).toBe(true);
  });

  it('should treat a blank API key as absent', () => {
    expect(loadConfig({ BING_NEWS_KEY: '   ' }).bing.apiKey).toBeUndefined();
    expect(loadConfig({ BING_NEWS_KEY: ' test-secret ' }).bing.apiKey).toBe('test-secret');
  });

  it('should split comma-separated feed lists', () => {
    const config = loadConfig({
      NEWS_RSS_FEEDS: 'https://a.example.com/feed, https://b.example.com/rss ,',
      EDGAR_FEEDS: 'https://edgar.example.com/atom',
    });

    expect(config.rssFeeds).toEqual(['https://a.example.com/feed', 'https://b.example.com/rss']);
    expect(config.edgar.feeds).toEqual(['https://edgar.example.com/atom']);
  });

  it('should parse boolean flags case-insensitively', () => {
    expect(loadConfig({ EDGAR_ENABLED: 'YES' }).edgar.enabled).toBe(true);
    expect(loadConfig({ EDGAR_ENABLED: '1' }).edgar.enabled).toBe(true);
    expect(loadConfig({ EDGAR_ENABLED: 'no' }).edgar.enabled).toBe(false);
  });

  it('should coerce numeric settings', () => {
    const config = loadConfig({ HTTP_TIMEOUT_MS: '5000', BING_QUERY_DELAY_MS: '0' });
    expect(config.http.timeoutMs).toBe(5000);
    expect(config.bing.queryDelayMs).toBe(0);
  });

  it('should reject an invalid feed URL', () => {
    try {
      loadConfig({ NEWS_RSS_FEEDS: 'not-a-url' });
      expect.unreachable('loadConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^NEWS_RSS_FEEDS/);
      }
    }
  });

  it('should reject non-numeric timeouts and unknown log levels', () => {
    expect(() => loadConfig({ HTTP_TIMEOUT_MS: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });

  it('should reject a backoff range whose max is below its min', () => {
    try {
      loadConfig({ GDELT_BACKOFF_MAX_MS: '1000' });
      expect.unreachable('loadConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual(['GDELT_BACKOFF_MAX_MS: must not be lower than GDELT_BACKOFF_MIN_MS']);
      }
    }
  });
});
