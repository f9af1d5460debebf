/**
 * DealScout — Report Export
 *
 * Serializes the ranked deal collection to CSV and JSON.
 * Both files are always written, even for an empty run.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import Papa from 'papaparse';
import type { DealRecord } from '../types';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

/** Column order of both report formats */
export const CSV_FIELDS = [
  'source',
  'source_type',
  'published_at',
  'title',
  'url',
  'deal_type_guess',
  'entities_guess',
  'amount_guess',
  'snippet',
] as const;

export type ReportField = (typeof CSV_FIELDS)[number];

export type ReportRow = Record<ReportField, string>;

export interface ReportPaths {
  csvPath: string;
  jsonPath: string;
}

export interface ExportResult {
  csvPath: string;
  jsonPath: string;
  recordCount: number;
  exportedAt: string;
}

// ============================================================
// ROWS
// ============================================================

/**
 * Map a record onto the report columns, in CSV_FIELDS order.
 */
export function toReportRow(record: DealRecord): ReportRow {
  return {
    source: record.source,
    source_type: record.sourceKind,
    published_at: record.publishedAt,
    title: record.title,
    url: record.url,
    deal_type_guess: record.dealType,
    entities_guess: record.entities,
    amount_guess: record.amount,
    snippet: record.snippet,
  };
}

// ============================================================
// CSV EXPORT
// ============================================================

/**
 * Header plus one row per record, CRLF separated, quoted only where needed.
 * An empty collection yields the header alone.
 */
export function exportDealsAsCsv(records: readonly DealRecord[]): string {
  const rows = records.map(record => {
    const row = toReportRow(record);
    return CSV_FIELDS.map(field => row[field]);
  });

  // Header goes in as the first row: the { fields, data } form pads an empty data set with a blank line
  return Papa.unparse([[...CSV_FIELDS], ...rows], { newline: '\r\n' });
}

// ============================================================
// JSON EXPORT
// ============================================================

/**
 * Array of row objects, two-space indented. Non-ASCII stays as-is.
 */
export function exportDealsAsJson(records: readonly DealRecord[]): string {
  return JSON.stringify(records.map(toReportRow), null, 2);
}

// ============================================================
// FILES
// ============================================================

async function writeUtf8(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
}

/**
 * Write both report files as UTF-8, creating parent directories.
 */
export async function writeDealReport(
  records: readonly DealRecord[],
  paths: ReportPaths
): Promise<ExportResult> {
  await writeUtf8(paths.csvPath, `${exportDealsAsCsv(records)}\r\n`);
  await writeUtf8(paths.jsonPath, `${exportDealsAsJson(records)}\n`);

  logger.info('Deal report written', {
    csvPath: paths.csvPath,
    jsonPath: paths.jsonPath,
    records: records.length,
  });

  return {
    csvPath: paths.csvPath,
    jsonPath: paths.jsonPath,
    recordCount: records.length,
    exportedAt: new Date().toISOString(),
  };
}
