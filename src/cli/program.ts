/**
 * DealScout — Weekly Deals CLI
 *
 * One run: fetch every enabled source over the lookback window,
 * merge, dedupe, rank, and write the CSV and JSON reports.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig, type AppConfig } from '../config/env';
import { configureLogger } from '../lib/logger';
import {
  aggregateDeals,
  registerDefaultSources,
  DEFAULT_WINDOW_DAYS,
  type AggregatorResult,
} from '../feeds';
import { writeDealReport, type ExportResult } from '../delivery';
import { DEAL_SOURCE_NAMES, type DealSourceName } from '../types';

// ============================================================
// TYPES
// ============================================================

export interface WeeklyDealsOptions {
  since: number;
  out: string;
  outJson: string;
  edgar: boolean;
  feed: string[];
  source?: DealSourceName[];
}

export interface WeeklyDealsSummary {
  aggregation: AggregatorResult;
  report: ExportResult;
}

// ============================================================
// ARGUMENT PARSERS
// ============================================================

export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return Number(trimmed);
}

function collectFeedUrl(value: string, previous: string[]): string[] {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new InvalidArgumentError(`Not a valid URL: ${value}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidArgumentError(`Not an http(s) URL: ${value}`);
  }
  return [...previous, value];
}

// ============================================================
// RUN
// ============================================================

/**
 * Fold command-line flags over the environment config.
 */
export function applyCliOverrides(config: AppConfig, options: WeeklyDealsOptions): AppConfig {
  return {
    ...config,
    edgar: { ...config.edgar, enabled: config.edgar.enabled || options.edgar },
    rssFeeds: [...config.rssFeeds, ...options.feed],
  };
}

/**
 * Execute one weekly run. Only configuration and file-system errors reject.
 */
export async function runWeeklyDeals(
  options: WeeklyDealsOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<WeeklyDealsSummary> {
  const config = applyCliOverrides(loadConfig(env), options);
  configureLogger({ level: config.logLevel });

  registerDefaultSources(config);

  console.log('\n' + '='.repeat(60));
  console.log('WEEKLY DEALS');
  console.log('='.repeat(60));
  console.log(`Window: last ${options.since} day(s)`);
  console.log('='.repeat(60) + '\n');

  const aggregation = await aggregateDeals({
    windowDays: options.since,
    sources: options.source,
  });

  for (const result of aggregation.sourceResults) {
    console.log(`${result.label} items: ${result.recordCount}`);
  }
  for (const error of aggregation.errors) {
    console.log(`  ! ${error}`);
  }

  const report = await writeDealReport(aggregation.records, {
    csvPath: options.out,
    jsonPath: options.outJson,
  });

  console.log(`Wrote ${report.recordCount} items to ${report.csvPath} and ${report.jsonPath}`);

  return { aggregation, report };
}

// ============================================================
// PROGRAM
// ============================================================

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('weekly-deals')
    .description('Collect the past week of cannabis deal announcements into CSV and JSON')
    .option('--since <days>', 'lookback window in days', parsePositiveInt, DEFAULT_WINDOW_DAYS)
    .option('--out <path>', 'CSV output path', 'deals.csv')
    .option('--out-json <path>', 'JSON output path', 'deals.json')
    .option('--edgar', 'include the SEC EDGAR filing feeds', false)
    .option('--feed <url...>', 'extra RSS/Atom feed URLs', collectFeedUrl, [])
    .addOption(
      new Option('--source <name...>', 'only fetch from these sources').choices([...DEAL_SOURCE_NAMES])
    )
    .action(async () => {
      await runWeeklyDeals(program.opts<WeeklyDealsOptions>(), env);
    });

  return program;
}
