/**
 * Backup Monitor — src/db/ensure.ts
 * WHAT: On-start schema self-heal for the backups table and its indexes.
 * WHY: Databases written by older releases must keep working without a migration
 *      step; additive ALTERs with defaults keep every historical row valid.
 * FLOWS:
 *  - Table missing → create with the current column set
 *  - Table present → PRAGMA table_info → ADD COLUMN for anything missing → backfill NULLs
 *  - Always → ensure timestamp index and unique backup_id index
 * DOCS:
 *  - SQLite ALTER TABLE: https://sqlite.org/lang_altertable.html
 *  - SQLite PRAGMA table_info: https://sqlite.org/pragma.html#pragma_table_info
 *
 * NOTE: Additive only. Never DROP, RENAME or rebuild the table here.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { SqliteDb } from "./db.js";
import { getRowCount, getTableColumns, hasUniqueIndexOn, tableExists } from "./helpers.js";
import { logger } from "../lib/logger.js";

export const BACKUPS_TABLE = "backups";

interface AddedColumn {
  name: string;
  ddl: string;
  /** Value pre-existing NULLs are backfilled to; null means NULL is the documented default. */
  backfill: number | null;
}

/**
 * Columns introduced after the first schema. Order matters only for logs.
 * Older releases created the phase durations without a DEFAULT, so they are
 * listed here too: that gives them a backfill even when the column exists.
 */
const ADDITIVE_COLUMNS: readonly AddedColumn[] = [
  { name: "duration_snapshot", ddl: "INTEGER DEFAULT 0", backfill: 0 },
  { name: "duration_archive", ddl: "INTEGER DEFAULT 0", backfill: 0 },
  { name: "duration_volumes", ddl: "INTEGER DEFAULT 0", backfill: 0 },
  { name: "duration_upload", ddl: "INTEGER DEFAULT 0", backfill: 0 },
  { name: "volume_bytes", ddl: "INTEGER DEFAULT 0", backfill: 0 },
  { name: "error_category", ddl: "TEXT", backfill: null },
  { name: "error_message", ddl: "TEXT", backfill: null },
];

export interface EnsureSchemaResult {
  created: boolean;
  addedColumns: string[];
  backfilledRows: number;
}

function createBackupsTable(db: SqliteDb): void {
  db.exec(`
    CREATE TABLE ${BACKUPS_TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      backup_id TEXT NOT NULL UNIQUE,
      success INTEGER NOT NULL,
      duration_total INTEGER NOT NULL,
      duration_snapshot INTEGER DEFAULT 0,
      duration_archive INTEGER DEFAULT 0,
      duration_volumes INTEGER DEFAULT 0,
      duration_upload INTEGER DEFAULT 0,
      size_bytes INTEGER NOT NULL,
      volume_bytes INTEGER DEFAULT 0,
      error_category TEXT,
      error_message TEXT
    )
  `);
}

function ensureIndexes(db: SqliteDb): void {
  // Every read path is "timestamp >= ?" or "ORDER BY timestamp"
  db.exec(`CREATE INDEX IF NOT EXISTS idx_backups_timestamp ON ${BACKUPS_TABLE}(timestamp)`);

  // Tables from every release declare backup_id UNIQUE, which gives an autoindex.
  // If someone hand-built the table without it, ON CONFLICT(backup_id) would fail
  // to compile, so add the index ourselves.
  if (!hasUniqueIndexOn(db, BACKUPS_TABLE, "backup_id")) {
    logger.info("[ensure] adding unique index on backups.backup_id");
    db.exec(`CREATE UNIQUE INDEX IF NOT EXISTS ux_backups_backup_id ON ${BACKUPS_TABLE}(backup_id)`);
  }
}

/**
 * Bring the backups table up to the current schema. Safe to call on every start;
 * a second call on a current schema changes nothing.
 */
export function ensureBackupsSchema(db: SqliteDb): EnsureSchemaResult {
  const result: EnsureSchemaResult = { created: false, addedColumns: [], backfilledRows: 0 };

  const migrate = db.transaction(() => {
    if (!tableExists(db, BACKUPS_TABLE)) {
      logger.info("[ensure] backups table does not exist, creating");
      createBackupsTable(db);
      ensureIndexes(db);
      result.created = true;
      return;
    }

    const present = new Set(getTableColumns(db, BACKUPS_TABLE).map((c) => c.name));

    for (const column of ADDITIVE_COLUMNS) {
      if (!present.has(column.name)) {
        logger.info({ column: column.name }, "[ensure] Migrating DB: adding column");
        // ADD COLUMN with a constant DEFAULT gives every existing row that value
        db.exec(`ALTER TABLE ${BACKUPS_TABLE} ADD COLUMN ${column.name} ${column.ddl}`);
        result.addedColumns.push(column.name);
      }
      if (column.backfill !== null) {
        const info = db
          .prepare(`UPDATE ${BACKUPS_TABLE} SET ${column.name} = ? WHERE ${column.name} IS NULL`)
          .run(column.backfill);
        result.backfilledRows += info.changes;
      }
    }

    ensureIndexes(db);
  });

  migrate();

  if (result.created || result.addedColumns.length > 0 || result.backfilledRows > 0) {
    logger.info(
      { ...result, rows: getRowCount(db, BACKUPS_TABLE) },
      "[ensure] backups schema updated"
    );
  } else {
    logger.debug("[ensure] backups schema already current");
  }

  return result;
}
