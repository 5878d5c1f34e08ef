/**
 * Matchflow — Tracker Store
 *
 * JSON file persistence for tracked records:
 * - reads are schema-checked; a missing file is an empty store
 * - writes go through a temp file and an atomic rename
 * - a lock file beside the store (exclusive create) keeps processes from
 *   interleaving read-modify-write cycles
 * - optional timestamped backups under `<dir>/backups/`
 */

import { promises as fs } from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import { STORE_VERSION, TrackerStoreSchema, type TrackedRecord } from '../types';
import { PersistenceError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { defaultSleep, type Sleep } from '../lib/retry';
import { writeFileAtomic } from '../lib/atomic-write';

// ============================================================
// OPTIONS
// ============================================================

export interface BackupOptions {
  enabled: boolean;
  intervalHours: number;
  maxBackups: number;
}

export interface StoreOptions {
  /** Give up acquiring the lock after this long */
  lockTimeoutMs?: number;
  /** A lock file older than this is considered abandoned */
  lockStaleMs?: number;
  /** Pause between lock attempts */
  lockRetryMs?: number;
  backup?: BackupOptions;
  now?: () => Date;
  sleep?: Sleep;
}

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
export const DEFAULT_LOCK_STALE_MS = 30_000;
const DEFAULT_LOCK_RETRY_MS = 50;

const BACKUP_DIR = 'backups';
const BACKUP_STAMP_PATTERN = /-(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z\.json$/;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function newLockToken(): string {
  return `${process.pid}:${nanoid(8)}`;
}

/**
 * 2026-10-19T14:12:00.000Z -> 20261019T141200000Z
 */
export function backupStamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

export function parseBackupStamp(fileName: string): Date | null {
  const match = fileName.match(BACKUP_STAMP_PATTERN);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, ms] = match.map(Number);
  return new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
}

// ============================================================
// STORE
// ============================================================

export class JsonFileStore {
  readonly path: string;
  readonly lockPath: string;
  readonly takeoverPath: string;

  private readonly lockTimeoutMs: number;
  private readonly lockStaleMs: number;
  private readonly lockRetryMs: number;
  private readonly backup: BackupOptions | undefined;
  private readonly now: () => Date;
  private readonly sleep: Sleep;
  private readonly log = logger.child({ component: 'tracker-store' });

  constructor(filePath: string, options: StoreOptions = {}) {
    this.path = filePath;
    this.lockPath = `${filePath}.lock`;
    this.takeoverPath = `${filePath}.lock.takeover`;
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.lockStaleMs = options.lockStaleMs ?? DEFAULT_LOCK_STALE_MS;
    this.lockRetryMs = options.lockRetryMs ?? DEFAULT_LOCK_RETRY_MS;
    this.backup = options.backup;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  get backupDir(): string {
    return path.join(path.dirname(this.path), BACKUP_DIR);
  }

  /**
   * Load every record. Throws PersistenceError on unreadable or corrupt
   * content rather than starting over with an empty store.
   */
  async read(): Promise<TrackedRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(this.path, `read failed: ${errorMessage(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(this.path, `corrupt store: ${errorMessage(error)}`, { cause: error });
    }

    const result = TrackerStoreSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new PersistenceError(
        this.path,
        `corrupt store: ${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
    }

    return result.data.records;
  }

  async write(records: TrackedRecord[]): Promise<void> {
    try {
      const content = JSON.stringify({ version: STORE_VERSION, records }, null, 2);
      await writeFileAtomic(this.path, content);
    } catch (error) {
      throw new PersistenceError(this.path, `write failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Run `fn` while holding the store's lock file.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const token = await this.acquireLock();
    try {
      return await fn();
    } finally {
      await this.releaseLock(token);
    }
  }

  private async acquireLock(): Promise<string> {
    const lockToken = newLockToken();
    const deadline = Date.now() + this.lockTimeoutMs;

    await fs.mkdir(path.dirname(this.lockPath), { recursive: true }).catch((error: unknown) => {
      throw new PersistenceError(this.path, `cannot create directory: ${errorMessage(error)}`, { cause: error });
    });

    for (;;) {
      try {
        await fs.writeFile(this.lockPath, lockToken, { flag: 'wx' });
        return lockToken;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw new PersistenceError(this.path, `lock failed: ${errorMessage(error)}`, { cause: error });
        }
      }

      if (await this.clearStaleLock()) continue;

      if (Date.now() >= deadline) {
        throw new PersistenceError(
          this.path,
          `timed out after ${this.lockTimeoutMs}ms waiting for lock ${this.lockPath}`
        );
      }
      await this.sleep(this.lockRetryMs);
    }
  }

  /**
   * Remove the lock file if its holder has not touched it within
   * `lockStaleMs`. Returns true when the caller should try again at once.
   *
   * Waiters take a short-lived takeover marker and re-check the lock under
   * it, so a fresh lock created by one waiter is never removed by another.
   */
  private async clearStaleLock(): Promise<boolean> {
    const ageMs = await this.fileAge(this.lockPath);
    // Released between our create attempt and the stat
    if (ageMs === null) return true;
    if (ageMs <= this.lockStaleMs) return false;

    try {
      await fs.writeFile(this.takeoverPath, newLockToken(), { flag: 'wx' });
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw new PersistenceError(this.path, `lock takeover failed: ${errorMessage(error)}`, { cause: error });
      }
      await this.clearAbandonedTakeover();
      return false;
    }

    try {
      const currentAgeMs = await this.fileAge(this.lockPath);
      if (currentAgeMs === null) return true;
      if (currentAgeMs <= this.lockStaleMs) return false;

      this.log.warn('Removing stale lock file', { lockPath: this.lockPath, ageMs: currentAgeMs });
      await fs.rm(this.lockPath, { force: true });
      return true;
    } finally {
      await fs.rm(this.takeoverPath, { force: true });
    }
  }

  /**
   * A takeover marker only outlives its waiter when that process died
   * mid-takeover.
   */
  private async clearAbandonedTakeover(): Promise<void> {
    const ageMs = await this.fileAge(this.takeoverPath);
    if (ageMs === null || ageMs <= this.lockStaleMs) return;

    this.log.warn('Removing abandoned takeover marker', { path: this.takeoverPath, ageMs });
    await fs.rm(this.takeoverPath, { force: true });
  }

  private async fileAge(filePath: string): Promise<number | null> {
    try {
      const { mtimeMs } = await fs.stat(filePath);
      return Date.now() - mtimeMs;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw new PersistenceError(this.path, `lock check failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async releaseLock(token: string): Promise<void> {
    try {
      const holder = await fs.readFile(this.lockPath, 'utf-8');
      if (holder === token) {
        await fs.rm(this.lockPath, { force: true });
      } else {
        this.log.warn('Lock file taken over by another holder', { lockPath: this.lockPath });
      }
    } catch (error) {
      this.log.warn('Failed to release lock', { lockPath: this.lockPath, error: errorMessage(error) });
    }
  }

  // ============================================================
  // BACKUPS
  // ============================================================

  async listBackups(): Promise<string[]> {
    const prefix = `${path.basename(this.path, '.json')}-`;
    let entries: string[];
    try {
      entries = await fs.readdir(this.backupDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    }

    // The stamp sorts lexicographically in time order
    return entries
      .filter(name => name.startsWith(prefix) && parseBackupStamp(name) !== null)
      .sort();
  }

  /**
   * Copy the store to the backup directory when the newest backup is older
   * than the configured interval, then prune down to `maxBackups`.
   * Returns the new backup's path, or null when none was due.
   */
  async backupIfDue(): Promise<string | null> {
    if (!this.backup?.enabled) return null;

    const now = this.now();
    const existing = await this.listBackups();
    const newest = existing.length > 0 ? parseBackupStamp(existing[existing.length - 1]) : null;
    const intervalMs = this.backup.intervalHours * 60 * 60 * 1000;

    if (newest && now.getTime() - newest.getTime() < intervalMs) {
      return null;
    }

    const fileName = `${path.basename(this.path, '.json')}-${backupStamp(now)}.json`;
    const backupPath = path.join(this.backupDir, fileName);

    await fs.mkdir(this.backupDir, { recursive: true });
    await fs.copyFile(this.path, backupPath);
    this.log.info('Store backed up', { backupPath });

    const all = [...existing, fileName];
    const excess = all.length - this.backup.maxBackups;
    for (const old of all.slice(0, Math.max(0, excess))) {
      await fs.rm(path.join(this.backupDir, old), { force: true });
      this.log.debug('Old backup removed', { file: old });
    }

    return backupPath;
  }
}
