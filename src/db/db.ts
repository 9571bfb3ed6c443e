/**
 * Backup Monitor — src/db/db.ts
 * WHAT: SQLite connection bootstrap.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs so the store just receives a ready handle.
 * FLOWS:
 *  - mkdir parent → open → set PRAGMAs → optional statement tracing
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous by design; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;
const IN_MEMORY = ":memory:";

export type SqliteDb = Database.Database;

export interface OpenDatabaseOptions {
  /** Log every executed statement at debug level. Defaults to DB_TRACE=1. */
  trace?: boolean;
}

/**
 * Open (creating if needed) the metrics database.
 *
 * @param dbPath - File path, or ":memory:" for tests
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): SqliteDb {
  const trace = options.trace ?? process.env.DB_TRACE === "1";

  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath, {
    fileMustExist: false,
    verbose: trace ? (sql) => logger.debug({ evt: "db_call", sql }, "db call") : undefined,
  });

  // WAL lets the dashboard read while the importer writes
  db.pragma("journal_mode = WAL");
  // Reduce fsync frequency vs FULL; WAL keeps this crash-safe
  db.pragma("synchronous = NORMAL");
  // Wait out brief write contention (e.g. an ad-hoc sqlite3 shell) instead of failing
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  logger.info({ dbPath, dbTraceEnabled: trace }, "SQLite opened");
  return db;
}
