/**
 * DealScout — Record Normalizer
 *
 * Converts upstream items from every source into the canonical DealRecord:
 * timestamp parsing, lookback-window checks, text cleanup and classification.
 */

import type { DealRecord, FeedEntry, SourceKind } from '../types';
import { DEFAULT_VOCABULARY, type Vocabulary } from '../config/vocabulary';
import { classifyDealType, extractAmount, extractEntities } from '../matching';
import { normalize, truncate } from '../lib/text';

export const SNIPPET_MAX_LENGTH = 280;

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================
// TIMESTAMPS
// ============================================================

const ISO_RE =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// GDELT-style "20261019T153000Z"
const COMPACT_RE = /^(\d{4})(\d{2})(\d{2})T?(\d{2})(\d{2})(\d{2})Z?$/i;

// Zone designators Date.parse understands in free-form dates
const ZONE_TOKEN_RE = /(?:\b(?:GMT|UTC?|Z)\b|\s[+-]\d{2}:?\d{2}\b|\b[ECMP][SD]T\b)/i;

interface TimestampParts {
  date: string;
  hm?: string;
  ss?: string;
  fraction?: string;
  zone?: string;
}

function fromParts({ date, hm, ss, fraction, zone }: TimestampParts): Date | null {
  const millis = (fraction ?? '').padEnd(3, '0').slice(0, 3);

  let offset = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    offset = zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }

  const canonical = `${date}T${hm ?? '00:00'}:${ss ?? '00'}.${millis}${offset}`;
  const ms = Date.parse(canonical);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Parse an upstream timestamp into an aware instant.
 *
 * Accepts ISO-8601 (any fraction length; UTC assumed when no zone is given),
 * compact "YYYYMMDDTHHMMSSZ" and RFC-2822 feed dates. Returns null when unparseable.
 */
export function parseTimestamp(raw: string | null | undefined): Date | null {
  const value = (raw ?? '').trim();
  if (!value) return null;

  const iso = value.match(ISO_RE);
  if (iso) {
    const [, date, hm, ss, fraction, zone] = iso;
    return fromParts({ date, hm, ss, fraction, zone });
  }

  const compact = value.match(COMPACT_RE);
  if (compact) {
    const [, y, mo, d, h, mi, ss] = compact;
    return fromParts({ date: `${y}-${mo}-${d}`, hm: `${h}:${mi}`, ss });
  }

  // Date.parse reads zone-less dates in host local time; pin them to UTC
  const ms = Date.parse(ZONE_TOKEN_RE.test(value) ? value : `${value} GMT`);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * True when `date` is no older than `windowDays` before `now`.
 */
export function isWithinWindow(date: Date, windowDays: number, now: Date = new Date()): boolean {
  return date.getTime() >= now.getTime() - windowDays * DAY_MS;
}

/**
 * Start of the lookback window.
 */
export function windowStart(windowDays: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - windowDays * DAY_MS);
}

/**
 * Raw timestamp of a feed entry: first present of published, updated.
 */
export function resolveEntryTimestamp(entry: FeedEntry): string | undefined {
  if (entry.published && entry.published.trim()) return entry.published;
  if (entry.updated && entry.updated.trim()) return entry.updated;
  return undefined;
}

// ============================================================
// RECORD CONSTRUCTION
// ============================================================

export interface DealRecordInput {
  source: string;
  sourceKind: SourceKind;
  publishedAt: Date;
  title?: string;
  url?: string;
  /** Description or summary; classification reads title + summary */
  summary?: string;
  /** Evidence text when it differs from the summary */
  snippet?: string;
}

/**
 * Build an immutable DealRecord. Text is normalized here, once,
 * and classification runs on the cleaned "title summary" blob.
 */
export function buildDealRecord(
  input: DealRecordInput,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): DealRecord {
  const title = normalize(input.title);
  const summary = normalize(input.summary);
  const blob = `${title} ${summary}`;

  return Object.freeze({
    source: input.source,
    sourceKind: input.sourceKind,
    publishedAt: input.publishedAt.toISOString(),
    title,
    url: (input.url ?? '').trim(),
    dealType: classifyDealType(blob, vocabulary.dealTypeKeywords),
    entities: extractEntities(title, vocabulary.entitySplitPhrases),
    amount: extractAmount(blob),
    snippet: truncate(normalize(input.snippet ?? input.summary), SNIPPET_MAX_LENGTH),
  });
}
