/**
 * Backup Monitor — src/store/backupStore.ts
 * WHAT: The single-table store for backup runs: insert-if-absent, windowed reads, eviction.
 * WHY: Uniqueness on backup_id is the one synchronization point between the scheduled
 *      importer and on-demand imports, so it lives here and nowhere else.
 * FLOWS:
 *  - open(path) → openDatabase → ensureSchema
 *  - upsertIfAbsent(record) → INSERT ... ON CONFLICT(backup_id) DO NOTHING → changes === 1
 *  - queryRecent / queryWindow / queryRecentFailures → rows → BackupRecord
 *  - evictOlderThan(cutoff) → DELETE WHERE timestamp < cutoff
 * DOCS:
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 *
 * NOTE: Timestamps are stored normalized (see lib/time.ts), so TEXT comparison is
 * chronological. Ties on timestamp fall back to id, i.e. insertion order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { openDatabase, type OpenDatabaseOptions, type SqliteDb } from "../db/db.js";
import { ensureBackupsSchema, type EnsureSchemaResult } from "../db/ensure.js";
import type { BackupRecord } from "../features/backupRecord.js";

/** Row shape as stored. Phase durations may be NULL in rows from old releases. */
interface BackupRow {
  timestamp: string;
  backup_id: string;
  success: number;
  duration_total: number;
  duration_snapshot: number | null;
  duration_archive: number | null;
  duration_volumes: number | null;
  duration_upload: number | null;
  size_bytes: number;
  volume_bytes: number | null;
  error_category: string | null;
  error_message: string | null;
}

const SELECT_COLUMNS = `
  timestamp, backup_id, success, duration_total, duration_snapshot,
  duration_archive, duration_volumes, duration_upload,
  size_bytes, volume_bytes, error_category, error_message
`;

/** SQLite reads a negative LIMIT as "no limit"; queries here must stay bounded. */
function boundedLimit(limit: number): number {
  if (!Number.isFinite(limit)) return 0;
  return Math.max(0, Math.floor(limit));
}

function toRecord(row: BackupRow): BackupRecord {
  return {
    timestamp: row.timestamp,
    backupId: row.backup_id,
    success: row.success === 1,
    durationTotal: row.duration_total,
    durationSnapshot: row.duration_snapshot ?? 0,
    durationArchive: row.duration_archive ?? 0,
    durationVolumes: row.duration_volumes ?? 0,
    durationUpload: row.duration_upload ?? 0,
    sizeBytes: row.size_bytes,
    volumeBytes: row.volume_bytes ?? 0,
    errorCategory: row.error_category,
    errorMessage: row.error_message,
  };
}

export class BackupStore {
  private readonly db: SqliteDb;

  constructor(db: SqliteDb) {
    this.db = db;
  }

  /** Open the database file and bring its schema up to date. */
  static open(dbPath: string, options?: OpenDatabaseOptions): BackupStore {
    const store = new BackupStore(openDatabase(dbPath, options));
    store.ensureSchema();
    return store;
  }

  /** Idempotent, additive-only schema migration. */
  ensureSchema(): EnsureSchemaResult {
    return ensureBackupsSchema(this.db);
  }

  /**
   * Insert a record unless one with the same backup_id is already stored.
   * @returns true if a row was created, false for a duplicate
   */
  upsertIfAbsent(record: BackupRecord): boolean {
    const info = this.db
      .prepare(
        `INSERT INTO backups
          (timestamp, backup_id, success, duration_total, duration_snapshot,
           duration_archive, duration_volumes, duration_upload, size_bytes,
           volume_bytes, error_category, error_message)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(backup_id) DO NOTHING`
      )
      .run(
        record.timestamp,
        record.backupId,
        record.success ? 1 : 0,
        record.durationTotal,
        record.durationSnapshot,
        record.durationArchive,
        record.durationVolumes,
        record.durationUpload,
        record.sizeBytes,
        record.volumeBytes,
        record.errorCategory,
        record.errorMessage
      );
    return info.changes === 1;
  }

  /** The most recent `limit` records, oldest first. */
  queryRecent(limit: number): BackupRecord[] {
    const rows = this.db
      .prepare<[number], BackupRow>(
        `SELECT ${SELECT_COLUMNS} FROM backups ORDER BY timestamp DESC, id DESC LIMIT ?`
      )
      .all(boundedLimit(limit));
    return rows.reverse().map(toRecord);
  }

  /** Every record with timestamp >= since, oldest first. */
  queryWindow(since: string): BackupRecord[] {
    const rows = this.db
      .prepare<[string], BackupRow>(
        `SELECT ${SELECT_COLUMNS} FROM backups WHERE timestamp >= ? ORDER BY timestamp ASC, id ASC`
      )
      .all(since);
    return rows.map(toRecord);
  }

  /** The most recent `limit` failed runs, newest first. */
  queryRecentFailures(limit: number): BackupRecord[] {
    const rows = this.db
      .prepare<[number], BackupRow>(
        `SELECT ${SELECT_COLUMNS} FROM backups WHERE success = 0 ORDER BY timestamp DESC, id DESC LIMIT ?`
      )
      .all(boundedLimit(limit));
    return rows.map(toRecord);
  }

  /**
   * Physically delete every record with timestamp strictly before `cutoff`.
   * @returns number of rows deleted
   */
  evictOlderThan(cutoff: string): number {
    return this.db.prepare(`DELETE FROM backups WHERE timestamp < ?`).run(cutoff).changes;
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM backups`).get();
    return row?.count ?? 0;
  }

  /**
   * Run `fn` in one SQLite transaction. Readers see the state before or after it,
   * never halfway. If `fn` throws, everything it wrote is rolled back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
