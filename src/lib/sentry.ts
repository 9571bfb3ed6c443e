/**
 * Backup Monitor — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture and shutdown flush.
 * WHY: Centralizes error tracking with guardrails when the DSN is missing or invalid.
 * FLOWS: initializeSentry(config) → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import type { MonitorConfig } from "./env.js";
import { logger, redact } from "./logger.js";

let sentryEnabled = false;

/**
 * Structural DSN check: https://{key}@{host}/{project}. No network call; a
 * revoked key is caught at runtime by the 403 handler below.
 */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates with a valid SENTRY_DSN, and never under Vitest.
 */
export function initializeSentry(config: MonitorConfig): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(config.sentryDsn)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: config.sentryDsn,
      environment: config.sentryEnvironment ?? config.nodeEnv,
      release: `backup-monitor@${process.env.npm_package_version ?? "unknown"}`,
      tracesSampleRate: config.sentryTracesSampleRate,
      integrations: [Sentry.onUnhandledRejectionIntegration({ mode: "warn" })],
      // Backup error messages can carry remote URLs with credentials
      beforeSend(event) {
        if (event.message) {
          event.message = redact(event.message);
        }
        return event;
      },
      ignoreErrors: ["AbortError"],
      debug: config.nodeEnv === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: config.sentryEnvironment ?? config.nodeEnv }, "Sentry initialized");

    // 403 = the project rejected our key. Stop sending instead of retrying forever.
    const client = Sentry.getClient();
    if (client) {
      client.on("afterSendEvent", (_event, response) => {
        if (response?.statusCode === 403) {
          logger.warn({ statusCode: response.statusCode }, "Sentry unauthorized (403); disabling capture");
          sentryEnabled = false;
          client.close(0).then(undefined, (err: unknown) => {
            logger.debug({ err }, "Sentry client close failed");
          });
        }
      });
    }
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/** Capture an exception. Returns the event id, or null when disabled. */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Flush pending events before the process exits.
 * @param timeoutMs - Upper bound on how long shutdown waits for the network.
 */
export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  try {
    return await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err }, "Sentry flush failed");
    return false;
  }
}
