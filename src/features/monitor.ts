/**
 * Backup Monitor — src/features/monitor.ts
 * WHAT: The query surface the dashboard and scripts call: recent metrics, stats,
 *       failures, failure trends and import-now.
 * WHY: One place turns bytes/second into rounded MB/s and store records into
 *      presentation rows, so callers never see SQLite or raw rates.
 * FLOWS:
 *  - createBackupMonitor(config) → BackupStore.open → importer + aggregator + scheduler
 *  - importNow() → scheduler.runOnce() → { status: "ok" | "error", importedAt, inserted }
 *  - health() → scheduler health snapshot for the import task
 *  - close() → stop scheduler → wait for scheduled and on-demand passes → close store
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MonitorConfig } from "../lib/env.js";
import { describeError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { getSchedulerHealthByName, type SchedulerHealth } from "../lib/schedulerHealth.js";
import { systemClock, type Clock } from "../lib/time.js";
import { ImportScheduler } from "../scheduler/importScheduler.js";
import { BackupStore } from "../store/backupStore.js";
import { BackupAggregator, type FailureDetail, type FailureTrend } from "./aggregator.js";
import { recordRates } from "./backupRecord.js";
import { MetricsImporter } from "./importer.js";

const BYTES_PER_MB = 1024 * 1024;

export const DEFAULT_RECENT_LIMIT = 30;
export const DEFAULT_STATS_WINDOW_DAYS = 30;
export const DEFAULT_FAILURES_LIMIT = 10;

/** bytes/second → MiB/s, rounded to 2 decimals */
export function bpsToMbps(bps: number): number {
  if (!Number.isFinite(bps) || bps <= 0) return 0;
  return Math.round((bps / BYTES_PER_MB) * 100) / 100;
}

export interface MetricRow {
  timestamp: string;
  backupId: string;
  success: boolean;
  durationTotal: number;
  durationSnapshot: number;
  durationArchive: number;
  durationVolumes: number;
  durationUpload: number;
  sizeBytes: number;
  volumeBytes: number;
  throughputMbPerSec: number;
  archiveMbPerSec: number;
  uploadMbPerSec: number;
  volumesMbPerSec: number;
  errorCategory: string | null;
  errorMessage: string | null;
}

export interface MonitorStats {
  totalBackups: number;
  /** Whole seconds, rounded down */
  avgDuration: number;
  maxDuration: number;
  minDuration: number;
  /** Whole MiB, rounded down */
  avgSizeMb: number;
  successRate: number;
  failedBackups: number;
  avgThroughputMbPerSec: number;
  avgOverallMbPerSec: number;
  avgArchiveMbPerSec: number;
  avgUploadMbPerSec: number;
  avgVolumesMbPerSec: number;
}

export type ImportNowResult =
  | { status: "ok"; importedAt: string; inserted: number }
  | { status: "error"; importedAt: string; inserted: 0; error: string };

export interface BackupMonitorDeps {
  store: BackupStore;
  importer: MetricsImporter;
  aggregator: BackupAggregator;
  scheduler: ImportScheduler;
  clock?: Clock;
}

export class BackupMonitor {
  readonly store: BackupStore;
  readonly importer: MetricsImporter;
  readonly aggregator: BackupAggregator;
  readonly scheduler: ImportScheduler;
  private readonly clock: Clock;

  constructor(deps: BackupMonitorDeps) {
    this.store = deps.store;
    this.importer = deps.importer;
    this.aggregator = deps.aggregator;
    this.scheduler = deps.scheduler;
    this.clock = deps.clock ?? systemClock;
  }

  /** The last `limit` runs, oldest first, with per-run MB/s figures. */
  recentMetrics(limit = DEFAULT_RECENT_LIMIT): MetricRow[] {
    return this.store.queryRecent(limit).map((record) => {
      const rates = recordRates(record);
      return {
        ...record,
        throughputMbPerSec: bpsToMbps(rates.overall),
        archiveMbPerSec: bpsToMbps(rates.archive),
        uploadMbPerSec: bpsToMbps(rates.upload),
        volumesMbPerSec: bpsToMbps(rates.volumes),
      };
    });
  }

  stats(windowDays = DEFAULT_STATS_WINDOW_DAYS): MonitorStats {
    const summary = this.aggregator.summarize(windowDays, this.clock());
    const overall = bpsToMbps(summary.avgRates.overall);
    return {
      totalBackups: summary.totalBackups,
      avgDuration: Math.floor(summary.avgDuration),
      maxDuration: summary.maxDuration,
      minDuration: summary.minDuration,
      avgSizeMb: Math.floor(summary.avgSizeBytes / BYTES_PER_MB),
      successRate: summary.successRate,
      failedBackups: summary.failedBackups,
      // Older dashboards read avgThroughput; both names carry the overall rate
      avgThroughputMbPerSec: overall,
      avgOverallMbPerSec: overall,
      avgArchiveMbPerSec: bpsToMbps(summary.avgRates.archive),
      avgUploadMbPerSec: bpsToMbps(summary.avgRates.upload),
      avgVolumesMbPerSec: bpsToMbps(summary.avgRates.volumes),
    };
  }

  failures(limit = DEFAULT_FAILURES_LIMIT): FailureDetail[] {
    return this.aggregator.recentFailures(limit);
  }

  failureTrends(windowDays = DEFAULT_STATS_WINDOW_DAYS): FailureTrend[] {
    return this.aggregator.failureTrends(windowDays, this.clock());
  }

  /**
   * Run one import pass now. Storage faults come back as `status: "error"`
   * instead of a rejection; the pass is still recorded in scheduler health.
   */
  async importNow(): Promise<ImportNowResult> {
    try {
      const summary = await this.scheduler.runOnce();
      return { status: "ok", importedAt: this.clock().toISOString(), inserted: summary.inserted };
    } catch (err) {
      logger.error({ err, evt: "import_now_failed" }, "[import] on-demand import failed");
      return {
        status: "error",
        importedAt: this.clock().toISOString(),
        inserted: 0,
        error: describeError(err),
      };
    }
  }

  /** Import health (last run, last error, failure streak), or null before the first pass. */
  health(): SchedulerHealth | null {
    return getSchedulerHealthByName(this.scheduler.name) ?? null;
  }

  /** Stop the scheduler, let every running pass finish, then close the database. */
  async close(): Promise<void> {
    this.scheduler.stop();
    await this.scheduler.whenIdle();
    this.store.close();
  }
}

/**
 * Wire the whole service from configuration. The scheduler is built but not
 * started; the entrypoint decides that (IMPORT_SCHEDULER_DISABLED).
 */
export function createBackupMonitor(config: MonitorConfig, clock: Clock = systemClock): BackupMonitor {
  const store = BackupStore.open(config.dbPath);
  const importer = new MetricsImporter(store, {
    metricsFile: config.metricsFile,
    retentionDays: config.retentionDays,
    clock,
  });
  const aggregator = new BackupAggregator(store, clock);
  const scheduler = new ImportScheduler(() => importer.importFile(), { intervalMs: config.importIntervalMs });

  return new BackupMonitor({ store, importer, aggregator, scheduler, clock });
}
