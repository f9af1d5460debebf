/**
 * DealScout — Delivery
 *
 * Report writers for the ranked deal collection.
 */

export {
  CSV_FIELDS,
  toReportRow,
  exportDealsAsCsv,
  exportDealsAsJson,
  writeDealReport,
  type ReportField,
  type ReportRow,
  type ReportPaths,
  type ExportResult,
} from './export';
