// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";
import Database from "better-sqlite3";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { ensureBackupsSchema } from "../../src/db/ensure.js";
import { hasUniqueIndexOn } from "../../src/db/helpers.js";

type BetterDb = Database.Database;

const CURRENT_COLUMNS = [
  "id",
  "timestamp",
  "backup_id",
  "success",
  "duration_total",
  "duration_snapshot",
  "duration_archive",
  "duration_volumes",
  "duration_upload",
  "size_bytes",
  "volume_bytes",
  "error_category",
  "error_message",
];

/** Helper: column names of the backups table, in declaration order. */
function columnNames(db: BetterDb): string[] {
  return db
    .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('backups')`)
    .all()
    .map((row) => row.name);
}

/**
 * The first released schema: no volume_bytes, no error columns, and phase
 * durations without a DEFAULT (so rows could hold NULL there).
 */
function createLegacyTable(db: BetterDb): void {
  db.exec(`
    CREATE TABLE backups (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      backup_id TEXT NOT NULL UNIQUE,
      success INTEGER NOT NULL,
      duration_total INTEGER NOT NULL,
      duration_snapshot INTEGER,
      duration_archive INTEGER,
      duration_volumes INTEGER,
      duration_upload INTEGER,
      size_bytes INTEGER NOT NULL,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP
    )
  `);
  const insert = db.prepare(
    `INSERT INTO backups (timestamp, backup_id, success, duration_total, duration_snapshot,
       duration_archive, duration_volumes, duration_upload, size_bytes)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  insert.run("2025-01-14T02:00:00.000Z", "legacy-1", 1, 600, 10, 300, 100, 190, 1000);
  insert.run("2025-01-15T02:00:00.000Z", "legacy-2", 0, 30, null, 20, 10, null, 0);
}

/**
 * Tests for the on-start schema self-heal.
 *
 * Three scenarios:
 * 1. Fresh install (no table exists)
 * 2. Legacy schema (columns missing, NULL phase durations)
 * 3. Already-current schema (running ensure again changes nothing)
 *
 * Each test gets a fresh in-memory SQLite DB to avoid cross-test pollution.
 */
describe("ensureBackupsSchema", () => {
  it("creates the backups table when missing", () => {
    const db = new Database(":memory:");
    try {
      const result = ensureBackupsSchema(db);

      expect(result).toEqual({ created: true, addedColumns: [], backfilledRows: 0 });
      expect(columnNames(db)).toEqual(CURRENT_COLUMNS);
      expect(hasUniqueIndexOn(db, "backups", "backup_id")).toBe(true);
    } finally {
      db.close();
    }
  });

  it("adds missing columns to a legacy table and keeps every row", () => {
    const db = new Database(":memory:");
    try {
      createLegacyTable(db);

      const result = ensureBackupsSchema(db);

      expect(result.created).toBe(false);
      expect(result.addedColumns).toEqual(["volume_bytes", "error_category", "error_message"]);
      // legacy-2 had NULL snapshot and upload durations
      expect(result.backfilledRows).toBe(2);

      const rows = db
        .prepare<
          [],
          {
            backup_id: string;
            duration_snapshot: number | null;
            duration_upload: number | null;
            volume_bytes: number | null;
            error_category: string | null;
            error_message: string | null;
          }
        >(
          `SELECT backup_id, duration_snapshot, duration_upload, volume_bytes, error_category, error_message
           FROM backups ORDER BY id`
        )
        .all();

      expect(rows).toEqual([
        {
          backup_id: "legacy-1",
          duration_snapshot: 10,
          duration_upload: 190,
          volume_bytes: 0,
          error_category: null,
          error_message: null,
        },
        {
          backup_id: "legacy-2",
          duration_snapshot: 0,
          duration_upload: 0,
          volume_bytes: 0,
          error_category: null,
          error_message: null,
        },
      ]);
    } finally {
      db.close();
    }
  });

  it("keeps columns it doesn't know about", () => {
    const db = new Database(":memory:");
    try {
      createLegacyTable(db);
      ensureBackupsSchema(db);
      expect(columnNames(db)).toContain("created_at");
    } finally {
      db.close();
    }
  });

  it("is a no-op on a current schema", () => {
    const db = new Database(":memory:");
    try {
      ensureBackupsSchema(db);
      db.prepare(
        `INSERT INTO backups (timestamp, backup_id, success, duration_total, size_bytes) VALUES (?, ?, ?, ?, ?)`
      ).run("2025-01-15T02:00:00.000Z", "b-1", 1, 60, 10);

      const second = ensureBackupsSchema(db);

      expect(second).toEqual({ created: false, addedColumns: [], backfilledRows: 0 });
      expect(columnNames(db)).toEqual(CURRENT_COLUMNS);
      expect(db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM backups`).get()?.n).toBe(1);
    } finally {
      db.close();
    }
  });

  it("adds a unique index when a hand-built table lacks one", () => {
    const db = new Database(":memory:");
    try {
      db.exec(`
        CREATE TABLE backups (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          timestamp TEXT NOT NULL,
          backup_id TEXT NOT NULL,
          success INTEGER NOT NULL,
          duration_total INTEGER NOT NULL,
          size_bytes INTEGER NOT NULL
        )
      `);
      expect(hasUniqueIndexOn(db, "backups", "backup_id")).toBe(false);

      ensureBackupsSchema(db);

      expect(hasUniqueIndexOn(db, "backups", "backup_id")).toBe(true);
    } finally {
      db.close();
    }
  });
});
