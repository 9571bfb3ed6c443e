/**
 * Backup Monitor — src/features/aggregator.ts
 * WHAT: Windowed statistics over stored backup runs: summary, weekly failure trends, recent failures.
 * WHY: These are the numbers the dashboard and the summary script show.
 * FLOWS:
 *  - summarize(days) → store.queryWindow(now - days) → counts + duration/size stats + mean-of-ratios rates
 *  - failureTrends(days) → failed records in window → group by (ISO week, category)
 *  - recentFailures(limit) → store.queryRecentFailures(limit)
 *
 * Rates stay in bytes/second here; MB/s rounding is presentation (see monitor.ts).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { isoWeekKey, systemClock, windowStart, type Clock } from "../lib/time.js";
import type { BackupStore } from "../store/backupStore.js";
import { UNKNOWN_ERROR_CATEGORY, recordRates, type BackupRecord, type RecordRates } from "./backupRecord.js";

export interface BackupSummary {
  totalBackups: number;
  successfulBackups: number;
  failedBackups: number;
  /** Integer percent, rounded down */
  successRate: number;
  /** Seconds; mean over records with a positive total duration */
  avgDuration: number;
  minDuration: number;
  maxDuration: number;
  avgSizeBytes: number;
  /** Bytes/second averages, one per rate kind */
  avgRates: RecordRates;
}

export interface FailureTrend {
  /** ISO week key, e.g. "2025-W03" */
  week: string;
  errorCategory: string;
  count: number;
}

export interface FailureDetail {
  timestamp: string;
  backupId: string;
  errorCategory: string;
  errorMessage: string | null;
}

const RATE_KINDS = ["overall", "archive", "upload", "volumes"] as const;

export function emptySummary(): BackupSummary {
  return {
    totalBackups: 0,
    successfulBackups: 0,
    failedBackups: 0,
    successRate: 0,
    avgDuration: 0,
    minDuration: 0,
    maxDuration: 0,
    avgSizeBytes: 0,
    avgRates: { overall: 0, archive: 0, upload: 0, volumes: 0 },
  };
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Min and max in one pass; spreading a large window into Math.min overflows the stack. */
function range(values: number[]): { min: number; max: number } {
  if (values.length === 0) return { min: 0, max: 0 };
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

/**
 * Mean of per-record ratios, counting only records whose own denominator is
 * positive. A run that skipped its upload phase has no upload rate; it must
 * not drag the upload average toward zero.
 */
function averageRates(records: BackupRecord[]): RecordRates {
  const samples: Record<keyof RecordRates, number[]> = { overall: [], archive: [], upload: [], volumes: [] };
  const denominators = (r: BackupRecord): RecordRates => ({
    overall: r.durationTotal,
    archive: r.durationArchive,
    upload: r.durationUpload,
    volumes: r.durationVolumes,
  });

  for (const record of records) {
    const rates = recordRates(record);
    const durations = denominators(record);
    for (const kind of RATE_KINDS) {
      if (durations[kind] > 0) samples[kind].push(rates[kind]);
    }
  }

  return {
    overall: mean(samples.overall),
    archive: mean(samples.archive),
    upload: mean(samples.upload),
    volumes: mean(samples.volumes),
  };
}

function toFailureDetail(record: BackupRecord): FailureDetail {
  return {
    timestamp: record.timestamp,
    backupId: record.backupId,
    errorCategory: record.errorCategory ?? UNKNOWN_ERROR_CATEGORY,
    errorMessage: record.errorMessage,
  };
}

export class BackupAggregator {
  private readonly store: BackupStore;
  private readonly clock: Clock;

  constructor(store: BackupStore, clock: Clock = systemClock) {
    this.store = store;
    this.clock = clock;
  }

  /**
   * Summary over the trailing `windowDays`.
   *
   * Counts and success rate cover every record in the window. Duration, size and
   * rate figures only cover records with a positive total duration, since a run
   * that died before timing anything has nothing to say about speed.
   */
  summarize(windowDays: number, now: Date = this.clock()): BackupSummary {
    const records = this.store.queryWindow(windowStart(now, windowDays));
    if (records.length === 0) return emptySummary();

    const total = records.length;
    const successful = records.filter((r) => r.success).length;
    const timed = records.filter((r) => r.durationTotal > 0);
    const durations = timed.map((r) => r.durationTotal);
    const { min, max } = range(durations);

    return {
      totalBackups: total,
      successfulBackups: successful,
      failedBackups: total - successful,
      successRate: Math.floor((successful * 100) / total),
      avgDuration: mean(durations),
      minDuration: min,
      maxDuration: max,
      avgSizeBytes: mean(timed.map((r) => r.sizeBytes)),
      avgRates: averageRates(timed),
    };
  }

  /** Failed runs in the trailing window, counted per ISO week and category. */
  failureTrends(windowDays: number, now: Date = this.clock()): FailureTrend[] {
    const counts = new Map<string, FailureTrend>();

    for (const record of this.store.queryWindow(windowStart(now, windowDays))) {
      if (record.success) continue;
      const week = isoWeekKey(record.timestamp);
      const errorCategory = record.errorCategory ?? UNKNOWN_ERROR_CATEGORY;
      // week keys are fixed width
      const key = week + errorCategory;
      const existing = counts.get(key);
      if (existing) {
        existing.count++;
      } else {
        counts.set(key, { week, errorCategory, count: 1 });
      }
    }

    return [...counts.values()].sort((a, b) => {
      if (a.week !== b.week) return a.week < b.week ? -1 : 1;
      if (a.errorCategory === b.errorCategory) return 0;
      return a.errorCategory < b.errorCategory ? -1 : 1;
    });
  }

  /** Most recent failed runs, newest first. */
  recentFailures(limit: number): FailureDetail[] {
    return this.store.queryRecentFailures(limit).map(toFailureDetail);
  }
}
