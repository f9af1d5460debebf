/**
 * DealScout — Deal Source Base
 *
 * Abstract base class for all deal sources.
 * Each source implements fetch(windowDays) and returns canonical records.
 */

import type {
  DealRecord,
  DealSourceName,
  SourceFetchResult,
  SourceKind,
} from '../types';
import { DEFAULT_VOCABULARY, type Vocabulary } from '../config/vocabulary';
import { DEFAULT_USER_AGENT } from '../config/env';
import { logger, type Logger } from '../lib/logger';

/**
 * Options shared by every source.
 */
export interface DealSourceOptions {
  /** Term sets for gates and classifiers */
  vocabulary?: Vocabulary;
  /** Per-request timeout */
  timeoutMs?: number;
  userAgent?: string;
  /** Clock used for ingestion time and window checks */
  now?: () => Date;
}

/**
 * Records plus the outcome summary of one source run.
 */
export interface DealSourceRun {
  records: DealRecord[];
  result: SourceFetchResult;
}

/**
 * Abstract base class for deal sources.
 */
export abstract class DealSource {
  abstract readonly name: DealSourceName;
  abstract readonly kind: SourceKind;
  abstract readonly fetchMethod: 'rss' | 'api';

  /** Label written to the `source` column */
  abstract readonly label: string;

  protected readonly vocabulary: Vocabulary;
  protected readonly timeoutMs: number;
  protected readonly userAgent: string;
  protected readonly now: () => Date;

  protected logger: Logger = logger.child({ source: this.constructor.name });

  constructor(options: DealSourceOptions = {}) {
    this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch records published within the last `windowDays` days.
   * Must be implemented by each source.
   */
  abstract fetch(windowDays: number): Promise<DealRecord[]>;

  /**
   * Execute fetch with error handling and logging.
   * Never rejects: an unexpected failure yields zero records and an error message.
   */
  async safeFetch(windowDays: number): Promise<DealSourceRun> {
    const startTime = Date.now();
    this.logger.info('Starting fetch', { windowDays, fetchMethod: this.fetchMethod });

    try {
      const records = await this.fetch(windowDays);
      const durationMs = Date.now() - startTime;

      this.logger.info('Fetch completed', { records: records.length, durationMs });

      return {
        records,
        result: {
          sourceName: this.name,
          label: this.label,
          success: true,
          recordCount: records.length,
          durationMs,
          fetchedAt: new Date().toISOString(),
        },
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);

      this.logger.error('Fetch failed', { error: errorMessage });

      return {
        records: [],
        result: {
          sourceName: this.name,
          label: this.label,
          success: false,
          recordCount: 0,
          durationMs: Date.now() - startTime,
          fetchedAt: new Date().toISOString(),
          error: errorMessage,
        },
      };
    }
  }
}

/**
 * Registry of the sources used by a run.
 */
const sourceRegistry: Map<DealSourceName, DealSource> = new Map();

/**
 * Register a deal source. A later registration under the same name replaces the earlier one.
 */
export function registerSource(source: DealSource): void {
  sourceRegistry.set(source.name, source);
  logger.debug('Source registered', { name: source.name, label: source.label });
}

/**
 * Get a registered deal source by name.
 */
export function getSource(name: DealSourceName): DealSource | undefined {
  return sourceRegistry.get(name);
}

/**
 * Get all registered sources, in registration order.
 */
export function getAllSources(): DealSource[] {
  return Array.from(sourceRegistry.values());
}

export function clearSources(): void {
  sourceRegistry.clear();
}
