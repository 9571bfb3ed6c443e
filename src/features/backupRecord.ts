/**
 * Backup Monitor — src/features/backupRecord.ts
 * WHAT: The BackupRecord shape, the line decoder for the metrics log, and per-record rates.
 * WHY: The log is written by shell scripts with hand-built JSON, so field types drift
 *      ("42" vs 42, true vs 1). Decoding coerces the known drift and rejects the
 *      rest as a whole record; nothing is ever partially stored.
 * FLOWS:
 *  - parseRecordLine(line) → JSON.parse → decodeRecord(value) → { ok, record } | { ok: false, reason }
 *  - recordRates(record) → bytes/sec for overall, archive, upload, volumes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { normalizeTimestamp } from "../lib/time.js";

export interface BackupRecord {
  /** UTC ISO-8601, e.g. "2025-01-15T02:00:00.000Z" */
  timestamp: string;
  /** Dedup key: one id per backup run */
  backupId: string;
  success: boolean;
  /** Seconds */
  durationTotal: number;
  durationSnapshot: number;
  durationArchive: number;
  durationVolumes: number;
  durationUpload: number;
  sizeBytes: number;
  /** Portion of sizeBytes that came from volume archives */
  volumeBytes: number;
  /** Only set on failed runs */
  errorCategory: string | null;
  errorMessage: string | null;
}

export type RecordDecodeResult =
  | { ok: true; record: BackupRecord }
  | { ok: false; reason: string };

export const UNKNOWN_ERROR_CATEGORY = "unknown";

const INTEGER_STRING_RE = /^[+-]?\d+$/;
const TRUE_STRINGS = new Set(["true", "1"]);
const FALSE_STRINGS = new Set(["false", "0"]);

/**
 * Integer coercion for counters: numbers truncate toward zero, strings must be
 * plain digits. Anything else is handed back untouched so zod reports the real type.
 */
function toInteger(value: unknown): unknown {
  if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === "string" && INTEGER_STRING_RE.test(value.trim())) return Number(value.trim());
  return value;
}

/** Optional counters: missing, null and "" all mean 0. */
function toOptionalInteger(value: unknown): unknown {
  if (value === undefined || value === null || value === "") return 0;
  return toInteger(value);
}

function toBoolean(value: unknown): unknown {
  if (value === 0 || value === 1) return value === 1;
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(lowered)) return true;
    if (FALSE_STRINGS.has(lowered)) return false;
  }
  return value;
}

/** Free-text fields: keep strings, stringify scalars, drop everything else. */
function toOptionalText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

const count = z.number().int().nonnegative();
const requiredCount = z.preprocess(toInteger, count);
const optionalCount = z.preprocess(toOptionalInteger, count);

const rawRecordSchema = z.object({
  timestamp: z.string().transform((value, ctx) => {
    const normalized = normalizeTimestamp(value);
    if (normalized === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not an ISO-8601 timestamp" });
      return z.NEVER;
    }
    return normalized;
  }),
  backup_id: z.preprocess(
    (value) => (typeof value === "number" && Number.isFinite(value) ? String(value) : value),
    z.string().trim().min(1, "must not be empty")
  ),
  success: z.preprocess(toBoolean, z.boolean()),
  duration_total: requiredCount,
  duration_snapshot: optionalCount,
  duration_archive: optionalCount,
  duration_volumes: optionalCount,
  duration_upload: optionalCount,
  size_bytes: requiredCount,
  volume_bytes: optionalCount,
  error_category: z.unknown(),
  error_message: z.unknown(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate one decoded JSON value.
 *
 * Error fields are only kept for failed runs; on a successful run they are
 * forced to null even when the producer wrote them.
 */
export function decodeRecord(value: unknown): RecordDecodeResult {
  const parsed = rawRecordSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) };
  }

  const data = parsed.data;
  const category = data.success ? null : toOptionalText(data.error_category);

  return {
    ok: true,
    record: {
      timestamp: data.timestamp,
      backupId: data.backup_id,
      success: data.success,
      durationTotal: data.duration_total,
      durationSnapshot: data.duration_snapshot,
      durationArchive: data.duration_archive,
      durationVolumes: data.duration_volumes,
      durationUpload: data.duration_upload,
      sizeBytes: data.size_bytes,
      volumeBytes: data.volume_bytes,
      errorCategory: data.success ? null : category?.trim() || UNKNOWN_ERROR_CATEGORY,
      errorMessage: data.success ? null : toOptionalText(data.error_message),
    },
  };
}

/**
 * Decode one line of the metrics log. Never throws: a bad line becomes
 * `{ ok: false, reason }` and the caller moves on to the next one.
 */
export function parseRecordLine(line: string): RecordDecodeResult {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `invalid JSON: ${message}` };
  }

  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { ok: false, reason: "line is not a JSON object" };
  }

  return decodeRecord(value);
}

/** Throughput figures for one record, bytes per second. */
export interface RecordRates {
  overall: number;
  archive: number;
  upload: number;
  volumes: number;
}

/** bytes / seconds, or 0 when there is no positive duration to divide by. */
export function rate(bytes: number, seconds: number): number {
  return seconds > 0 ? bytes / seconds : 0;
}

export function recordRates(record: BackupRecord): RecordRates {
  return {
    overall: rate(record.sizeBytes, record.durationTotal),
    archive: rate(record.sizeBytes, record.durationArchive),
    upload: rate(record.sizeBytes, record.durationUpload),
    volumes: rate(record.volumeBytes, record.durationVolumes),
  };
}
