/**
 * Matchflow — Tracker
 *
 * Durable status tracking for items the pipeline has accepted. Records are
 * keyed by fingerprint, so tracking the same item twice is a no-op.
 *
 * Every mutation runs the same cycle under the store lock: re-read the
 * store, apply the change to a copy, write it atomically, then commit the
 * copy in memory. If any step throws, memory keeps its previous state.
 */

import { promises as fs } from 'fs';
import path from 'path';
import {
  ItemSchema,
  type ExportFormat,
  type Item,
  type TrackedRecord,
  type TrackedStatus,
  type TrackerStats,
} from '../types';
import { PersistenceError, RecordNotFoundError, errorMessage } from '../lib/errors';
import { fingerprintItem } from '../lib/fingerprint';
import { logger } from '../lib/logger';
import { SerialQueue } from '../lib/serial';
import { exportRecords } from './export';
import { assertTransition, isTerminal } from './state-machine';
import { JsonFileStore, type StoreOptions } from './store';

// ============================================================
// TYPES
// ============================================================

export interface TrackerOptions extends StoreOptions {
  storagePath: string;
}

export interface TrackResult {
  fingerprint: string;
  created: boolean;
}

interface MutationOutcome<T> {
  records: TrackedRecord[];
  result: T;
  changed: boolean;
}

function cloneRecord(record: TrackedRecord): TrackedRecord {
  return structuredClone(record);
}

/**
 * History timestamps never go backwards, even if the wall clock does.
 */
function nextTimestamp(now: Date, previous: string): string {
  return now.getTime() > Date.parse(previous) ? now.toISOString() : previous;
}

// ============================================================
// TRACKER
// ============================================================

export class Tracker {
  private records: TrackedRecord[];
  private readonly store: JsonFileStore;
  private readonly queue = new SerialQueue();
  private readonly now: () => Date;
  private readonly log = logger.child({ component: 'tracker' });

  private constructor(store: JsonFileStore, records: TrackedRecord[], now: () => Date) {
    this.store = store;
    this.records = records;
    this.now = now;
  }

  /**
   * Open (or create) the store at `storagePath` and load its records.
   */
  static async open(options: TrackerOptions): Promise<Tracker> {
    const { storagePath, ...storeOptions } = options;
    const store = new JsonFileStore(storagePath, storeOptions);
    const records = await store.read();
    const tracker = new Tracker(store, records, options.now ?? (() => new Date()));

    tracker.log.info('Tracker opened', { storagePath, records: records.length });
    return tracker;
  }

  get storagePath(): string {
    return this.store.path;
  }

  get size(): number {
    return this.records.length;
  }

  // ============================================================
  // MUTATIONS
  // ============================================================

  async track(item: Item): Promise<string> {
    const { fingerprint } = await this.trackWithResult(item);
    return fingerprint;
  }

  /**
   * Like `track`, also reporting whether a new record was created.
   */
  async trackWithResult(item: Item): Promise<TrackResult> {
    const fingerprint = fingerprintItem(item);
    const stored = this.toStoredItem(item);

    return this.mutate<TrackResult>((records) => {
      if (records.some(r => r.fingerprint === fingerprint)) {
        return { records, result: { fingerprint, created: false }, changed: false };
      }

      const timestamp = this.now().toISOString();
      const record: TrackedRecord = {
        fingerprint,
        item: stored,
        status: 'new',
        history: [{ status: 'new', timestamp }],
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      this.log.info('Item tracked', { fingerprint, title: item.title });
      return { records: [...records, record], result: { fingerprint, created: true }, changed: true };
    });
  }

  /**
   * The item exactly as the store file will hold it. Values JSON cannot
   * carry are refused up front so memory and disk never disagree.
   */
  private toStoredItem(item: Item): Item {
    let roundTripped: unknown;
    try {
      roundTripped = JSON.parse(JSON.stringify(item));
    } catch (error) {
      throw new PersistenceError(
        this.store.path,
        `item ${item.id} cannot be stored: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const result = ItemSchema.safeParse(roundTripped);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new PersistenceError(
        this.store.path,
        `item ${item.id} cannot be stored: ${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
    }
    return result.data;
  }

  async updateStatus(
    fingerprint: string,
    status: TrackedStatus,
    note?: string
  ): Promise<TrackedRecord> {
    return this.mutate((records) => {
      const index = records.findIndex(r => r.fingerprint === fingerprint);
      if (index === -1) {
        throw new RecordNotFoundError(fingerprint);
      }

      const updated = this.transition(records[index], status, note);
      const next = [...records];
      next[index] = updated;

      this.log.info('Status updated', { fingerprint, from: records[index].status, to: status });
      return { records: next, result: cloneRecord(updated), changed: true };
    });
  }

  /**
   * Remove a record. Returns false when it did not exist.
   */
  async delete(fingerprint: string): Promise<boolean> {
    return this.mutate((records) => {
      const next = records.filter(r => r.fingerprint !== fingerprint);
      const removed = next.length !== records.length;
      if (removed) this.log.info('Record deleted', { fingerprint });
      return { records: next, result: removed, changed: removed };
    });
  }

  /**
   * Remove every record matching the status filter (all records when
   * omitted) and return what was removed.
   */
  async purge(statusFilter?: TrackedStatus): Promise<TrackedRecord[]> {
    return this.mutate((records) => {
      const matches = (r: TrackedRecord) => statusFilter === undefined || r.status === statusFilter;
      const removed = records.filter(matches);
      const next = records.filter(r => !matches(r));

      if (removed.length > 0) {
        this.log.info('Records purged', { status: statusFilter ?? 'all', count: removed.length });
      }
      return { records: next, result: removed.map(cloneRecord), changed: removed.length > 0 };
    });
  }

  /**
   * Move non-terminal records not updated within `maxAgeMs` to `expired`.
   * Returns the fingerprints that changed.
   */
  async expireOlderThan(maxAgeMs: number, note = 'Expired after inactivity'): Promise<string[]> {
    return this.mutate((records) => {
      const cutoff = this.now().getTime() - maxAgeMs;
      const expired: string[] = [];

      const next = records.map((record) => {
        if (isTerminal(record.status) || Date.parse(record.updatedAt) >= cutoff) {
          return record;
        }
        expired.push(record.fingerprint);
        return this.transition(record, 'expired', note);
      });

      if (expired.length > 0) {
        this.log.info('Records expired', { count: expired.length, maxAgeMs });
      }
      return { records: next, result: expired, changed: expired.length > 0 };
    });
  }

  /**
   * Pick up changes another process wrote to the store.
   */
  async reload(): Promise<void> {
    await this.queue.run(async () => {
      this.records = await this.store.read();
    });
  }

  // ============================================================
  // READS
  // ============================================================

  get(fingerprint: string): TrackedRecord | undefined {
    const record = this.records.find(r => r.fingerprint === fingerprint);
    return record ? cloneRecord(record) : undefined;
  }

  getAll(statusFilter?: TrackedStatus): TrackedRecord[] {
    return this.records
      .filter(r => statusFilter === undefined || r.status === statusFilter)
      .map(cloneRecord);
  }

  stats(): TrackerStats {
    const stats: TrackerStats = {
      new: 0,
      in_progress: 0,
      completed: 0,
      rejected: 0,
      expired: 0,
      total: this.records.length,
    };
    for (const record of this.records) {
      stats[record.status]++;
    }
    return stats;
  }

  export(format: ExportFormat, statusFilter?: TrackedStatus): string {
    return exportRecords(this.getAll(statusFilter), format);
  }

  /**
   * Write an export to disk. Returns the number of records written.
   */
  async exportToFile(
    filePath: string,
    format: ExportFormat,
    statusFilter?: TrackedStatus
  ): Promise<number> {
    const records = this.getAll(statusFilter);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, exportRecords(records, format), 'utf-8');

    this.log.info('Records exported', { filePath, format, count: records.length });
    return records.length;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private transition(record: TrackedRecord, status: TrackedStatus, note?: string): TrackedRecord {
    assertTransition(record.fingerprint, record.status, status);

    const timestamp = nextTimestamp(this.now(), record.updatedAt);
    return {
      ...record,
      status,
      history: [...record.history, note === undefined ? { status, timestamp } : { status, timestamp, note }],
      updatedAt: timestamp,
    };
  }

  private mutate<T>(apply: (records: TrackedRecord[]) => MutationOutcome<T>): Promise<T> {
    return this.queue.run(() =>
      this.store.withLock(async () => {
        const current = await this.store.read();
        const { records, result, changed } = apply(current);

        if (changed) {
          await this.store.write(records);
          await this.backupAfterWrite();
        }

        this.records = records;
        return result;
      })
    );
  }

  private async backupAfterWrite(): Promise<void> {
    try {
      await this.store.backupIfDue();
    } catch (error) {
      // The mutation is already durable; a missed backup is retried next write.
      this.log.warn('Backup failed', { storagePath: this.store.path, error: errorMessage(error) });
    }
  }
}
