/**
 * Backup Monitor — src/scheduler/importScheduler.ts
 * WHAT: Periodic scheduler for the metrics import.
 * WHY: Keep the backups table in step with the metrics log without manual triggers.
 * FLOWS:
 *  - start() → one pass immediately → then every intervalMs until stop()
 *  - Each pass → task() → recordSchedulerRun → log inserted/duplicates/rejected
 *  - Failed pass → logged with its error kind, next tick retries
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ImportSummary } from "../features/importer.js";
import { MIN_IMPORT_INTERVAL_MS } from "../lib/env.js";
import { classifyError, describeError, isRecoverable } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";

export type ImportTask = () => Promise<ImportSummary>;

export interface ImportSchedulerOptions {
  intervalMs: number;
  /** Key in scheduler health; defaults to "metricsImport" */
  name?: string;
}

export class ImportScheduler {
  readonly intervalMs: number;
  readonly name: string;
  private readonly task: ImportTask;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  /** Every pass still running, scheduled or on demand; settles without rejecting */
  private readonly passes = new Set<Promise<void>>();

  constructor(task: ImportTask, options: ImportSchedulerOptions) {
    this.task = task;
    this.name = options.name ?? "metricsImport";

    if (!Number.isFinite(options.intervalMs) || options.intervalMs < MIN_IMPORT_INTERVAL_MS) {
      logger.warn(
        { requestedMs: options.intervalMs, minimumMs: MIN_IMPORT_INTERVAL_MS },
        "[import] interval too small, using minimum 1 minute"
      );
      this.intervalMs = MIN_IMPORT_INTERVAL_MS;
    } else {
      this.intervalMs = options.intervalMs;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Start the loop. The first pass runs right away so a fresh deploy shows
   * data without waiting a whole interval. Calling start() twice is a no-op.
   *
   * @example
   * const scheduler = new ImportScheduler(() => importer.importFile(), { intervalMs });
   * scheduler.start();
   * process.on("SIGTERM", () => scheduler.stop());
   */
  start(): void {
    if (this.timer) return;

    logger.info(
      { scheduler: this.name, intervalMinutes: Math.round((this.intervalMs / 60000) * 100) / 100 },
      "[import] scheduler starting"
    );

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.tick();
  }

  /** Prevent future ticks. A pass already running is allowed to finish. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info({ scheduler: this.name }, "[import] scheduler stopped");
    }
  }

  /**
   * Resolves once no pass is running, including runOnce() calls made outside
   * the timer. Used on shutdown before closing the store.
   */
  async whenIdle(): Promise<void> {
    await this.inFlight;
    while (this.passes.size > 0) {
      await Promise.all(this.passes);
    }
  }

  /**
   * Run one import pass and record it in scheduler health.
   * Rejects with the pass's error; the timer path catches and logs it.
   */
  runOnce(): Promise<ImportSummary> {
    const pass = this.execute();
    const settled: Promise<void> = pass
      .then(
        () => undefined,
        () => undefined
      )
      .finally(() => {
        this.passes.delete(settled);
      });
    this.passes.add(settled);
    return pass;
  }

  private async execute(): Promise<ImportSummary> {
    const startedAt = Date.now();
    try {
      const summary = await this.task();
      const durationMs = Date.now() - startedAt;
      recordSchedulerRun(this.name, { success: true, inserted: summary.inserted, durationMs });
      logger.info({ scheduler: this.name, ...summary, durationMs }, "[import] pass completed");
      return summary;
    } catch (err) {
      recordSchedulerRun(this.name, {
        success: false,
        error: describeError(err),
        durationMs: Date.now() - startedAt,
      });
      throw err;
    }
  }

  private tick(): void {
    // better-sqlite3 is synchronous, but reading the log is not. A slow disk can
    // still be reading when the next tick fires.
    if (this.inFlight) {
      logger.debug({ scheduler: this.name }, "[import] previous pass still running, skipping tick");
      return;
    }

    this.inFlight = this.runOnce()
      .then(
        () => undefined,
        (err: unknown) => {
          const classified = classifyError(err);
          logger.error(
            { err, scheduler: this.name, kind: classified.kind, recoverable: isRecoverable(classified) },
            "[import] scheduled pass failed"
          );
        }
      )
      .finally(() => {
        this.inFlight = null;
      });
  }
}
