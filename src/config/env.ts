/**
 * DealScout — Environment Configuration
 *
 * Validates process environment into a typed config.
 * The CLI loads `.env` through dotenv before calling loadConfig().
 */

import { z } from 'zod';
import type { LogLevel } from '../lib/logger';

export const DEFAULT_EDGAR_FEEDS = [
  'https://www.sec.gov/cgi-bin/browse-edgar?action=getcurrent&CIK=&type=8-K&company=&dateb=&owner=include&start=0&count=100&output=atom',
  'https://www.sec.gov/cgi-bin/browse-edgar?action=getcurrent&CIK=&type=S-4&company=&dateb=&owner=include&start=0&count=100&output=atom',
  'https://www.sec.gov/cgi-bin/browse-edgar?action=getcurrent&CIK=&type=SC%2013D&company=&dateb=&owner=include&start=0&count=100&output=atom',
];

export const BING_DEFAULT_ENDPOINT = 'https://api.bing.microsoft.com/v7.0/news/search';

export const GDELT_DEFAULT_ENDPOINT = 'https://api.gdeltproject.org/api/v2/doc/doc';

export const DEFAULT_USER_AGENT = 'DealScoutWeeklyBot/0.1 (contact: research@example.com)';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Blank strings count as unset */
const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const urlList = z
  .string()
  .optional()
  .transform(v =>
    (v ?? '')
      .split(',')
      .map(s => s.trim())
      .filter(s => s.length > 0)
  )
  .pipe(z.array(z.string().url()));

const booleanFlag = z
  .string()
  .optional()
  .transform(v => ['true', '1', 'yes'].includes((v ?? '').trim().toLowerCase()));

const EnvSchema = z.object({
  BING_NEWS_KEY: optionalString,
  BING_NEWS_ENDPOINT: z.string().url().default(BING_DEFAULT_ENDPOINT),
  GDELT_ENDPOINT: z.string().url().default(GDELT_DEFAULT_ENDPOINT),
  EDGAR_ENABLED: booleanFlag,
  EDGAR_FEEDS: urlList,
  NEWS_RSS_FEEDS: urlList,
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  BING_QUERY_DELAY_MS: z.coerce.number().int().nonnegative().default(350),
  GDELT_BACKOFF_MIN_MS: z.coerce.number().int().nonnegative().default(5_000),
  GDELT_BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(9_000),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  bing: {
    apiKey?: string;
    endpoint: string;
    queryDelayMs: number;
  };
  gdelt: {
    endpoint: string;
    backoffMinMs: number;
    backoffMaxMs: number;
  };
  edgar: {
    enabled: boolean;
    feeds: string[];
  };
  rssFeeds: string[];
  http: {
    timeoutMs: number;
    userAgent: string;
  };
  logLevel: LogLevel;
}

/**
 * Parse and validate environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;

  if (e.GDELT_BACKOFF_MAX_MS < e.GDELT_BACKOFF_MIN_MS) {
    const issue = 'GDELT_BACKOFF_MAX_MS: must not be lower than GDELT_BACKOFF_MIN_MS';
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }

  return {
    bing: {
      apiKey: e.BING_NEWS_KEY,
      endpoint: e.BING_NEWS_ENDPOINT,
      queryDelayMs: e.BING_QUERY_DELAY_MS,
    },
    gdelt: {
      endpoint: e.GDELT_ENDPOINT,
      backoffMinMs: e.GDELT_BACKOFF_MIN_MS,
      backoffMaxMs: e.GDELT_BACKOFF_MAX_MS,
    },
    edgar: {
      enabled: e.EDGAR_ENABLED,
      feeds: e.EDGAR_FEEDS.length > 0 ? e.EDGAR_FEEDS : [...DEFAULT_EDGAR_FEEDS],
    },
    rssFeeds: e.NEWS_RSS_FEEDS,
    http: {
      timeoutMs: e.HTTP_TIMEOUT_MS,
      userAgent: e.USER_AGENT,
    },
    logLevel: e.LOG_LEVEL,
  };
}
