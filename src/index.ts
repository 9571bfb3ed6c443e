/**
 * Backup Monitor — src/index.ts
 * WHAT: Main process entrypoint. Loads config, opens the store, and runs the periodic metrics import.
 * WHY: Central orchestration so startup and shutdown order live in one place.
 * FLOWS:
 *  - Startup: .env → config → Sentry → store (schema self-heal) → scheduler
 *  - SIGTERM/SIGINT: stop scheduler → wait for the running pass → close DB → flush Sentry → exit
 * DOCS:
 *  - Node ESM modules: https://nodejs.org/api/esm.html
 *  - process signals: https://nodejs.org/api/process.html#signal-events
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Must stay first: the logger reads LOG_* at module load.
import "dotenv/config";

import { createBackupMonitor } from "./features/monitor.js";
import { loadConfig } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry } from "./lib/sentry.js";

const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

// ===== Global Error Handlers =====
process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - exiting"
  );
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry a moment to send, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

const config = loadConfig();
initializeSentry(config);

logger.info(
  {
    dbPath: config.dbPath,
    metricsFile: config.metricsFile,
    importIntervalHours: config.importIntervalMs / 3_600_000,
    retentionDays: config.retentionDays,
    schedulerDisabled: config.schedulerDisabled,
    nodeEnv: config.nodeEnv,
  },
  "[startup] Backup monitor configuration"
);

const monitor = createBackupMonitor(config);

// ===== Coordinated Graceful Shutdown =====
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    await monitor.close();
    logger.debug("[shutdown] Scheduler stopped, database closed");
    await flushSentry();
    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => {
  gracefulShutdown("SIGTERM").catch((err: unknown) => logger.error({ err }, "[shutdown] failed"));
});
process.on("SIGINT", () => {
  gracefulShutdown("SIGINT").catch((err: unknown) => logger.error({ err }, "[shutdown] failed"));
});

if (config.schedulerDisabled) {
  // Nothing else holds the event loop open, so the process ends here.
  // Use scripts/importNow.ts for one-off imports in this mode.
  logger.info("[startup] IMPORT_SCHEDULER_DISABLED set, not starting the import scheduler");
  monitor.close().catch((err: unknown) => logger.error({ err }, "[shutdown] close failed"));
} else {
  monitor.scheduler.start();
  logger.info({ intervalMs: monitor.scheduler.intervalMs }, "[startup] Backup monitor ready");
}
