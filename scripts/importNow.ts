/**
 * Backup Monitor — scripts/importNow.ts
 * WHAT: Run one metrics import pass on demand and print the outcome as JSON.
 * WHY: Backup scripts call this right after appending to the metrics log, so the
 *      dashboard doesn't wait for the next scheduled pass.
 *
 * USAGE:
 *   tsx scripts/importNow.ts
 *   npm run import:now
 *
 * Exit code is 1 when the pass failed (the JSON still says why).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import "dotenv/config";

import { createBackupMonitor } from "../src/features/monitor.js";
import { loadConfig } from "../src/lib/env.js";

const monitor = createBackupMonitor(loadConfig());

try {
  const result = await monitor.importNow();
  console.log(JSON.stringify(result, null, 2));
  process.exitCode = result.status === "ok" ? 0 : 1;
} finally {
  await monitor.close();
}
