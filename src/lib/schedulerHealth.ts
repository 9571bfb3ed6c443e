/**
 * Backup Monitor — src/lib/schedulerHealth.ts
 * WHAT: Health tracking for scheduled background tasks (the periodic metrics import).
 * WHY: A pass that fails is logged and retried on the next tick, so without this
 *      a broken import can go unnoticed for days. Consecutive failures are counted
 *      and escalated to an error-level log.
 * FLOWS:
 *  - recordSchedulerRun(name, outcome) → update health state → alert if threshold exceeded
 *  - getSchedulerHealthByName(name) → snapshot for BackupMonitor.health() and the summary script
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  /** Scheduler name (e.g. "metricsImport") */
  name: string;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Message of the most recent failure, cleared on success */
  lastError: string | null;
  /** Rows inserted by the most recent successful pass */
  lastInserted: number | null;
  /** Wall time of the most recent pass, success or failure */
  lastDurationMs: number | null;
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

export type SchedulerRunOutcome =
  | { success: true; inserted?: number; durationMs?: number }
  | { success: false; error: string; durationMs?: number };

/** Threshold of consecutive failures before emitting an alert log */
const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

function emptyHealth(name: string): SchedulerHealth {
  return {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    lastError: null,
    lastInserted: null,
    lastDurationMs: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };
}

/**
 * Record the result of one scheduler pass.
 *
 * @example
 * try {
 *   const summary = await importer.importFile();
 *   recordSchedulerRun("metricsImport", { success: true, inserted: summary.inserted });
 * } catch (err) {
 *   recordSchedulerRun("metricsImport", { success: false, error: describeError(err) });
 * }
 */
export function recordSchedulerRun(name: string, outcome: SchedulerRunOutcome): void {
  const now = Date.now();
  const health = schedulerHealth.get(name) ?? emptyHealth(name);

  health.lastRunAt = now;
  health.totalRuns++;
  health.lastDurationMs = outcome.durationMs ?? null;

  if (outcome.success) {
    health.lastSuccessAt = now;
    health.lastError = null;
    health.lastInserted = outcome.inserted ?? null;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.lastError = outcome.error;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
        lastError: health.lastError,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/**
 * Clear all scheduler health state.
 * NOTE: For tests - gives each case a clean slate.
 */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
