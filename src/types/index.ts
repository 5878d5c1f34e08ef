/**
 * Matchflow — Type Exports
 */

export type {
  Item,
  RawItem,
  Fingerprint,
  DedupMethod,
  BlockRuleType,
  BlockRule,
} from './item';
export {
  ItemSchema,
  DedupMethodSchema,
  BlockRuleTypeSchema,
  BlockRuleSchema,
} from './item';

export type {
  TrackedStatus,
  HistoryEntry,
  TrackedRecord,
  TrackerStore,
  ExportFormat,
  TrackerStats,
} from './tracking';
export {
  TrackedStatusSchema,
  HistoryEntrySchema,
  TrackedRecordSchema,
  TrackerStoreSchema,
  ExportFormatSchema,
  STORE_VERSION,
} from './tracking';

export type {
  EvaluationResult,
  ChunkOutcome,
  BackendAttempt,
} from './evaluation';
