/**
 * Matchflow — Tracker Module
 */

import type { MatchflowConfig } from '../config';
import { Tracker, type TrackerOptions } from './tracker';

export { Tracker } from './tracker';
export type { TrackerOptions, TrackResult } from './tracker';
export {
  JsonFileStore,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_LOCK_TIMEOUT_MS,
  backupStamp,
  parseBackupStamp,
} from './store';
export type { BackupOptions, StoreOptions } from './store';
export {
  ALLOWED_TRANSITIONS,
  TERMINAL_STATUSES,
  assertTransition,
  canTransition,
  isTerminal,
} from './state-machine';
export {
  CSV_COLUMNS,
  escapeCsvField,
  exportRecords,
  exportRecordsAsCsv,
  exportRecordsAsJson,
} from './export';

/**
 * Open the tracker described by the `tracking` config section.
 */
export function createTracker(
  config: MatchflowConfig,
  overrides: Partial<TrackerOptions> = {}
): Promise<Tracker> {
  const { tracking } = config;

  return Tracker.open({
    storagePath: tracking.storage_path,
    backup: {
      enabled: tracking.auto_backup,
      intervalHours: tracking.backup_interval_hours,
      maxBackups: tracking.max_backups,
    },
    ...overrides,
  });
}
