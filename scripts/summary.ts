/**
 * Backup Monitor — scripts/summary.ts
 * WHAT: Print stats, recent failures, weekly failure trends and import health as JSON.
 * HOW: Reads the store only, unless --import runs one pass first. Health is
 *      tracked per process, so importHealth is null without --import.
 *
 * USAGE:
 *   tsx scripts/summary.ts              # last 30 days, 10 failures
 *   tsx scripts/summary.ts --days 7     # last week
 *   tsx scripts/summary.ts --failures 25
 *   tsx scripts/summary.ts --import     # import first, include the pass's health
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import "dotenv/config";

import {
  DEFAULT_FAILURES_LIMIT,
  DEFAULT_STATS_WINDOW_DAYS,
  createBackupMonitor,
} from "../src/features/monitor.js";
import { loadConfig } from "../src/lib/env.js";

/** `--name 12` → 12. Missing or non-positive values fall back. */
function numericFlag(args: string[], name: string, fallback: number): number {
  const index = args.indexOf(name);
  if (index === -1 || index + 1 >= args.length) return fallback;
  const value = Number(args[index + 1]);
  if (!Number.isInteger(value) || value <= 0) {
    console.error(`Ignoring ${name}=${args[index + 1]}: expected a positive whole number`);
    return fallback;
  }
  return value;
}

const args = process.argv.slice(2);
const days = numericFlag(args, "--days", DEFAULT_STATS_WINDOW_DAYS);
const failureLimit = numericFlag(args, "--failures", DEFAULT_FAILURES_LIMIT);
const importFirst = args.includes("--import");

const monitor = createBackupMonitor(loadConfig());

try {
  const imported = importFirst ? await monitor.importNow() : null;
  const report = {
    windowDays: days,
    import: imported,
    stats: monitor.stats(days),
    failures: monitor.failures(failureLimit),
    failureTrends: monitor.failureTrends(days),
    importHealth: monitor.health(),
  };
  console.log(JSON.stringify(report, null, 2));
} finally {
  await monitor.close();
}
