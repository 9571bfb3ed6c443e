/**
 * Backup Monitor — src/lib/env.ts
 * WHAT: Environment validation via zod into an explicit MonitorConfig.
 * WHY: Keep process.env access centralized, and hand components a typed config
 *      object instead of having them read globals.
 * FLOWS: (dotenv/config at entry) → loadConfig(process.env) → per-field parse → fallback + warn
 * DOCS:
 *  - zod: https://zod.dev/
 *  - dotenv: https://github.com/motdotla/dotenv
 *
 * NOTE: Unlike a bot token, nothing here is worth refusing to start over. A bad
 * value falls back to its default with a warning so the dashboard still comes up.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { logger } from "./logger.js";

export const DEFAULT_IMPORT_INTERVAL_HOURS = 12;
export const DEFAULT_RETENTION_DAYS = 90;
export const DEFAULT_DB_PATH = "data/backups.db";
export const DEFAULT_METRICS_FILE = "data/metrics.jsonl";

/** Floor for the import interval: polling faster than once a minute is a misconfiguration. */
export const MIN_IMPORT_INTERVAL_MS = 60 * 1000;

const MS_PER_HOUR = 60 * 60 * 1000;

export interface MonitorConfig {
  importIntervalMs: number;
  retentionDays: number;
  dbPath: string;
  metricsFile: string;
  schedulerDisabled: boolean;
  nodeEnv: "development" | "production" | "test";
  sentryDsn: string | undefined;
  sentryEnvironment: string | undefined;
  sentryTracesSampleRate: number;
}

// "yes", "YES", "1", "true", "on"... people put all sorts in .env files
const truthyPattern = /^(1|true|yes|on)$/i;

const nonEmpty = z.string().min(1, "must not be empty");

const schemas = {
  IMPORT_INTERVAL_HOURS: z.coerce.number().finite("must be a number"),
  RETENTION_DAYS: z.coerce
    .number()
    .int("must be a whole number of days")
    .min(1, "must be positive"),
  DB_PATH: nonEmpty,
  METRICS_FILE: nonEmpty,
  NODE_ENV: z.enum(["development", "production", "test"]),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1),
};

/**
 * Parse one variable. Missing (or blank) → default, silently. Present but
 * invalid → default, with a warning naming the variable and the problem.
 */
function readVar<T>(
  source: NodeJS.ProcessEnv,
  key: keyof typeof schemas,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  warnings: string[]
): T {
  const raw = source[key]?.trim();
  if (raw === undefined || raw === "") return fallback;

  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const reason = parsed.error.issues.map((i) => i.message).join(", ");
  warnings.push(`${key}=${JSON.stringify(raw)} is invalid (${reason}), using default ${String(fallback)}`);
  return fallback;
}

/**
 * Convert the configured interval in hours to milliseconds, enforcing the
 * one-minute floor. Values below the floor are clamped, not rejected.
 */
export function resolveImportIntervalMs(hours: number, warnings: string[]): number {
  const ms = Math.round(hours * MS_PER_HOUR);
  if (ms < MIN_IMPORT_INTERVAL_MS) {
    warnings.push(`IMPORT_INTERVAL_HOURS too small (${hours}h), using minimum 1 minute`);
    return MIN_IMPORT_INTERVAL_MS;
  }
  return ms;
}

/**
 * Build the runtime configuration from an environment map.
 *
 * @param source - Defaults to process.env; tests pass a plain object.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const warnings: string[] = [];

  const intervalHours = readVar(
    source,
    "IMPORT_INTERVAL_HOURS",
    schemas.IMPORT_INTERVAL_HOURS,
    DEFAULT_IMPORT_INTERVAL_HOURS,
    warnings
  );

  const config: MonitorConfig = {
    importIntervalMs: resolveImportIntervalMs(intervalHours, warnings),
    retentionDays: readVar(source, "RETENTION_DAYS", schemas.RETENTION_DAYS, DEFAULT_RETENTION_DAYS, warnings),
    dbPath: readVar(source, "DB_PATH", schemas.DB_PATH, DEFAULT_DB_PATH, warnings),
    metricsFile: readVar(source, "METRICS_FILE", schemas.METRICS_FILE, DEFAULT_METRICS_FILE, warnings),
    schedulerDisabled: truthyPattern.test(source.IMPORT_SCHEDULER_DISABLED?.trim() ?? ""),
    nodeEnv: readVar(source, "NODE_ENV", schemas.NODE_ENV, "development", warnings),
    sentryDsn: source.SENTRY_DSN?.trim() || undefined,
    sentryEnvironment: source.SENTRY_ENVIRONMENT?.trim() || undefined,
    sentryTracesSampleRate: readVar(
      source,
      "SENTRY_TRACES_SAMPLE_RATE",
      schemas.SENTRY_TRACES_SAMPLE_RATE,
      0.1,
      warnings
    ),
  };

  for (const warning of warnings) {
    logger.warn({ evt: "config_fallback" }, `[config] ${warning}`);
  }

  return config;
}
