/**
 * Tests for the weekly deals CLI
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommanderError, InvalidArgumentError } from 'commander';
import {
  createProgram,
  parsePositiveInt,
  applyCliOverrides,
  runWeeklyDeals,
} from '../../src/cli/program';
import { loadConfig, ConfigError } from '../../src/config/env';
import { configureLogger } from '../../src/lib/logger';
import { jsonResponse, textResponse } from '../helpers/http';

const QUIET_ENV = {
  LOG_LEVEL: 'error',
  BING_QUERY_DELAY_MS: '0',
  GDELT_BACKOFF_MIN_MS: '0',
  GDELT_BACKOFF_MAX_MS: '0',
};

function silentProgram(env: NodeJS.ProcessEnv = QUIET_ENV) {
  return createProgram(env)
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
}

async function parseError(args: string[]): Promise<unknown> {
  try {
    await silentProgram().parseAsync(args, { from: 'user' });
  } catch (error) {
    return error;
  }
  return undefined;
}

/** "20261019T110000Z" */
function compactTimestamp(date: Date): string {
  return `${date.toISOString().replace(/[-:]/g, '').slice(0, 15)}Z`;
}

describe('weekly-deals CLI', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    configureLogger({ level: 'info' });
  });

  describe('parsePositiveInt', () => {
    it('should accept positive integers', () => {
      expect(parsePositiveInt('7')).toBe(7);
      expect(parsePositiveInt(' 30 ')).toBe(30);
    });

    it('should reject zero, negatives, fractions and words', () => {
      for (const value of ['0', '-3', '2.5', 'abc', '']) {
        expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
      }
    });
  });

  describe('options', () => {
    it('should declare defaults', () => {
      const program = createProgram(QUIET_ENV);

      expect(program.options.map(o => [o.long, o.defaultValue])).toEqual([
        ['--since', 7],
        ['--out', 'deals.csv'],
        ['--out-json', 'deals.json'],
        ['--edgar', false],
        ['--feed', []],
        ['--source', undefined],
      ]);
    });

    it('should reject invalid arguments', async () => {
      for (const args of [
        ['--since', '0'],
        ['--feed', 'not-a-url'],
        ['--feed', 'ftp://feeds.example.com/x'],
        ['--source', 'twitter'],
      ]) {
        const error = await parseError(args);
        expect(error).toBeInstanceOf(CommanderError);
        if (error instanceof CommanderError) {
          expect(error.code).toBe('commander.invalidArgument');
        }
      }
    });
  });

  describe('applyCliOverrides', () => {
    it('should enable EDGAR and append feeds without touching the input', () => {
      const config = loadConfig({ NEWS_RSS_FEEDS: 'https://a.example.com/feed' });

      const merged = applyCliOverrides(config, {
        since: 7,
        out: 'deals.csv',
        outJson: 'deals.json',
        edgar: true,
        feed: ['https://b.example.com/feed'],
      });

      expect(merged.edgar.enabled).toBe(true);
      expect(merged.rssFeeds).toEqual(['https://a.example.com/feed', 'https://b.example.com/feed']);
      expect(config.edgar.enabled).toBe(false);
      expect(config.rssFeeds).toEqual(['https://a.example.com/feed']);
    });
  });

  describe('runWeeklyDeals', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'weekly-deals-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should fetch, rank and write both reports', async () => {
      const now = Date.now();
      const hourAgo = new Date(now - 60 * 60 * 1000);
      const twoHoursAgo = new Date(now - 2 * 60 * 60 * 1000);

      const rss = `<rss version="2.0"><channel><item>
        <title>Green Valley Dispensary acquires Rival Cannabis</title>
        <link>https://news.example.com/green</link>
        <pubDate>${twoHoursAgo.toUTCString()}</pubDate>
      </item></channel></rss>`;

      const mockFetch = vi.fn(async (url: string) => {
        if (url.startsWith('https://api.gdeltproject.org/')) {
          return jsonResponse({
            articles: [{
              url: 'https://smallpaper.example.com/deal',
              title: 'Hemp processor acquires rival for $3 million',
              seendate: compactTimestamp(hourAgo),
              domain: 'smallpaper.example.com',
            }],
          });
        }
        if (url === 'https://feeds.example.com/one') return textResponse(rss);
        return textResponse('not found', 404);
      });
      vi.stubGlobal('fetch', mockFetch);

      const csvPath = join(dir, 'deals.csv');
      const jsonPath = join(dir, 'deals.json');

      await silentProgram().parseAsync(
        ['--out', csvPath, '--out-json', jsonPath, '--feed', 'https://feeds.example.com/one'],
        { from: 'user' }
      );

      // No Bing key and EDGAR off: only GDELT and the feed are requested
      expect(mockFetch).toHaveBeenCalledTimes(2);

      const rows: unknown = JSON.parse(await readFile(jsonPath, 'utf8'));
      expect(rows).toEqual([
        expect.objectContaining({ source: 'GDELT (smallpaper.example.com)', deal_type_guess: 'M&A' }),
        expect.objectContaining({ source: 'RSS (https://feeds.example.com/one)', url: 'https://news.example.com/green' }),
      ]);

      const lines = (await readFile(csvPath, 'utf8')).split('\r\n');
      expect(lines).toHaveLength(4);
      expect(lines[3]).toBe('');

      expect(console.log).toHaveBeenCalledWith('Bing News items: 0');
      expect(console.log).toHaveBeenCalledWith('GDELT items: 1');
      expect(console.log).toHaveBeenCalledWith('RSS items: 1');
      expect(console.log).toHaveBeenCalledWith(`Wrote 2 items to ${csvPath} and ${jsonPath}`);
    });

    it('should reject invalid configuration', async () => {
      await expect(
        runWeeklyDeals(
          { since: 7, out: join(dir, 'a.csv'), outJson: join(dir, 'a.json'), edgar: false, feed: [] },
          { HTTP_TIMEOUT_MS: 'abc' }
        )
      ).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
