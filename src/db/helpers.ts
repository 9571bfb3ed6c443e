/**
 * Backup Monitor — src/db/helpers.ts
 * WHAT: Schema introspection helpers used by the on-start schema self-heal.
 * HOW: sqlite_master lookups and PRAGMA table_info / index_list / index_info.
 * DOCS:
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { SqliteDb } from "./db.js";

export interface ColumnInfo {
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | number | null;
  pk: number;
}

/**
 * Check if a table exists in the database
 *
 * @example
 * if (!tableExists(db, "backups")) {
 *   db.exec(`CREATE TABLE backups (...)`);
 * }
 */
export function tableExists(db: SqliteDb, tableName: string): boolean {
  const result = db
    .prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' AND name=?`)
    .get(tableName);
  return result !== undefined;
}

/** List all columns of a table, in declaration order. */
export function getTableColumns(db: SqliteDb, tableName: string): ColumnInfo[] {
  return db
    .prepare<[string], ColumnInfo>(`SELECT name, type, "notnull", dflt_value, pk FROM pragma_table_info(?)`)
    .all(tableName);
}

/**
 * True if some UNIQUE index (or UNIQUE/PRIMARY KEY constraint) covers exactly
 * `columnName`. ON CONFLICT(column) upserts need one to exist.
 */
export function hasUniqueIndexOn(db: SqliteDb, tableName: string, columnName: string): boolean {
  const indexes = db
    .prepare<[string], { name: string; unique: number }>(`SELECT name, "unique" FROM pragma_index_list(?)`)
    .all(tableName);

  return indexes.some((idx) => {
    if (idx.unique !== 1) return false;
    const cols = db
      .prepare<[string], { name: string | null }>(`SELECT name FROM pragma_index_info(?)`)
      .all(idx.name);
    return cols.length === 1 && cols[0].name === columnName;
  });
}

/** Row count of a table (used in migration log lines). */
export function getRowCount(db: SqliteDb, tableName: string): number {
  const result = db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${tableName}`).get();
  return result?.count ?? 0;
}
