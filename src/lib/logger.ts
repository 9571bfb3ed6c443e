/**
 * Backup Monitor — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep importer/store modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";
import { isRecord } from "./errors.js";

/**
 * Redaction patterns for secrets that might leak into logs.
 *
 * URL credentials: rclone remotes and Sentry DSNs embed user:secret@host. We keep
 *                  the user and host, mask the secret.
 * Key/value pairs: backup scripts sometimes echo `password=...` or `token=...` into
 *                  their error_message, which then lands in a rejected-line excerpt.
 */
const urlCredentialRe = /(https?:\/\/)([^:@/\s]+):[^@\s]+@/gi;
const secretPairRe = /\b(password|passwd|token|secret|api[_-]?key)=([^\s&"',]+)/gi;

const MAX_REDACTED_LENGTH = 300;

// Sentry import warning flag - only warn once per process, not on every error
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any data read from the metrics log.
 * Truncates at 300 chars so one oversized line can't flood the log.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(urlCredentialRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(secretPairRe, "$1=[redacted]");
  if (sanitized.length > MAX_REDACTED_LENGTH) {
    sanitized = `${sanitized.slice(0, MAX_REDACTED_LENGTH)}...`;
  }
  return sanitized;
}

/**
 * Only the fields worth keeping from an error. SqliteError and Node system
 * errors both carry `code`, which is what we grep for in production logs.
 */
function serializeErr(e: unknown): Record<string, unknown> {
  if (!isRecord(e)) return { message: String(e) };
  return {
    name: e.name,
    code: e.code,
    message: e.message,
    stack: e.stack,
  };
}

/**
 * Pick the pino transport from the environment.
 *
 * Pretty printing is opt-in (LOG_PRETTY=true on a TTY). LOG_FILE appends JSON
 * lines to that path; rotation is left to logrotate. Otherwise stdout, so the
 * container log driver can parse the lines.
 */
export function logTransport(env: NodeJS.ProcessEnv, isTTY: boolean): pino.TransportSingleOptions | undefined {
  if (env.LOG_PRETTY === "true" && isTTY) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
        singleLine: false,
      },
    };
  }
  if (env.LOG_FILE) {
    return { target: "pino/file", options: { destination: env.LOG_FILE, mkdir: true } };
  }
  return undefined;
}

const transport = logTransport(process.env, process.stdout.isTTY === true);

export const logger = pino({
  // Defaults to "info"; LOG_LEVEL overrides
  level: process.env.LOG_LEVEL ?? "info",
  ...(transport ? { transport } : {}),
  base: undefined, // Omit pid/hostname from JSON output too
  serializers: {
    err: serializeErr,
  },
  /**
   * Intercepts error-level logs and forwards the attached Error to Sentry, so
   * callers just use logger.error({ err }, "...") and reporting stays automatic.
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const secondArg: unknown = args[1];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : isRecord(firstArg) && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof secondArg === "string" ? secondArg : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import keeps Sentry optional and avoids a require cycle
          // (sentry.ts logs through this module).
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", serializeErr(importErr).message);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
