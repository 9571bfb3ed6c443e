/**
 * Backup Monitor — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: The importer must tell "log not written yet" from "disk gone", and the
 *      scheduler logs which kind of failure broke a pass. Bad lines never get
 *      here: decoding returns a rejection reason instead of throwing.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying on the next tick)
 *  - isMissingFile(err) → boolean (ENOENT: treated as zero new records)
 * USAGE:
 *  import { classifyError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "db_error" && classified.code === "SQLITE_BUSY") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * Base error interface for the discriminated union pattern.
 *
 * The `kind` field is the discriminator - TypeScript narrows on it in switch
 * statements, which also works for errors thrown across module boundaries.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite).
 *
 * - SQLITE_BUSY/SQLITE_LOCKED: Transient, next tick will retry
 * - SQLITE_CONSTRAINT_*: Logic error (duplicates never get here, ON CONFLICT absorbs them)
 * - SQLITE_CORRUPT/SQLITE_NOTADB/SQLITE_CANTOPEN: storage medium problem
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

/** Filesystem errors raised while reading the metrics log. */
export interface IoError extends AppError {
  kind: "io";
  code: string; // ENOENT, EACCES, EISDIR, EIO, ...
  path?: string;
}

/** Unknown/unclassified errors */
export interface UnknownError extends AppError {
  kind: "unknown";
}

/** Discriminated union of all error types */
export type ClassifiedError = DbError | IoError | UnknownError;

const IO_CODES = new Set(["ENOENT", "EACCES", "EPERM", "EISDIR", "ENOTDIR", "EIO", "EMFILE", "EBUSY", "ENOSPC"]);
const TRANSIENT_IO_CODES = new Set(["EMFILE", "EBUSY", "EIO"]);
const TRANSIENT_DB_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_IOERR"]);

/** Narrow unknown to an indexable object without casting. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function stringField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

// ===== Error Classification =====

/**
 * Classify any caught error into a discriminated union.
 *
 * SQLite errors have a distinctive name and code prefix; Node system errors
 * have an errno-style code. Everything else is unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (!isRecord(err)) {
    return { kind: "unknown", message: String(err) };
  }

  const message = stringField(err, "message") ?? String(err);
  const code = stringField(err, "code");
  const name = stringField(err, "name");

  if (name === "SqliteError" || code?.startsWith("SQLITE_")) {
    return { kind: "db_error", code: code ?? "UNKNOWN", message, cause };
  }

  if (code && IO_CODES.has(code)) {
    return { kind: "io", code, path: stringField(err, "path"), message, cause };
  }

  return { kind: "unknown", message, cause };
}

/**
 * Whether the next scheduled pass has a reasonable chance of succeeding
 * without anyone touching the box.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "db_error":
      return TRANSIENT_DB_CODES.has(err.code);
    case "io":
      return TRANSIENT_IO_CODES.has(err.code);
    case "unknown":
      return true;
  }
}

/** ENOENT: the producer hasn't written the metrics log yet. */
export function isMissingFile(err: unknown): boolean {
  const classified = classifyError(err);
  return classified.kind === "io" && classified.code === "ENOENT";
}

/** Short human-readable line for logs and the import-now response. */
export function describeError(err: unknown): string {
  const classified = classifyError(err);
  switch (classified.kind) {
    case "db_error":
    case "io":
      return `${classified.code}: ${classified.message}`;
    default:
      return classified.message;
  }
}
