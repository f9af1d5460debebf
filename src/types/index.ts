/**
 * DealScout — Type Exports
 *
 * Re-exports all types from the types module.
 */

export type {
  DealType,
  SourceKind,
  DealSourceName,
  DealRecord,
  FeedEntry,
  SourceFetchResult,
} from './deal-record';
export { DEAL_SOURCE_NAMES } from './deal-record';
