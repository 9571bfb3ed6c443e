/**
 * Backup Monitor — src/features/importer.ts
 * WHAT: Reads the JSON-lines metrics log and inserts new backup runs into the store.
 * WHY: The log is append-only and re-read in full on every pass, so each pass must be
 *      idempotent: duplicates are absorbed by the store, bad lines are skipped every time.
 * FLOWS:
 *  - importFile() → read METRICS_FILE (ENOENT = no data yet) → importBatch(lines)
 *  - importBatch(lines) → transaction { per line: decode → skip expired → upsertIfAbsent } → evict
 * DOCS:
 *  - JSON Lines: https://jsonlines.org/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { readFile } from "node:fs/promises";
import { isMissingFile } from "../lib/errors.js";
import { logger, redact } from "../lib/logger.js";
import { systemClock, windowStart, type Clock } from "../lib/time.js";
import type { BackupStore } from "../store/backupStore.js";
import { parseRecordLine } from "./backupRecord.js";

export interface ImporterOptions {
  metricsFile: string;
  retentionDays: number;
  clock?: Clock;
}

export interface ImportSummary {
  /** Records newly stored by this pass */
  inserted: number;
  /** Valid records whose backup_id was already stored */
  duplicates: number;
  /** Lines that failed to parse or validate */
  rejected: number;
  /** Valid records already older than the retention cutoff; not stored */
  expired: number;
  /** Rows deleted by the retention pass */
  evicted: number;
  /** True when the metrics log doesn't exist yet */
  sourceMissing: boolean;
}

// Rejected lines are logged individually up to this many per pass; a log that
// is wholesale garbage shouldn't drown everything else.
const MAX_REJECT_LOGS_PER_PASS = 20;

function emptySummary(): ImportSummary {
  return { inserted: 0, duplicates: 0, rejected: 0, expired: 0, evicted: 0, sourceMissing: false };
}

export class MetricsImporter {
  private readonly store: BackupStore;
  private readonly metricsFile: string;
  private readonly retentionDays: number;
  private readonly clock: Clock;

  constructor(store: BackupStore, options: ImporterOptions) {
    this.store = store;
    this.metricsFile = options.metricsFile;
    this.retentionDays = options.retentionDays;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Import every line of `lines`, then evict records past retention.
   *
   * Runs as one transaction: a storage fault (disk full, corrupt file) rolls the
   * whole pass back and is rethrown for the caller to log. Rejected lines and
   * duplicates are normal and never throw.
   */
  importBatch(lines: Iterable<string>, now: Date = this.clock()): ImportSummary {
    const cutoff = windowStart(now, this.retentionDays);
    const summary = emptySummary();

    this.store.transaction(() => {
      let lineNumber = 0;
      for (const line of lines) {
        lineNumber++;
        if (!line.trim()) continue;

        const result = parseRecordLine(line);
        if (!result.ok) {
          summary.rejected++;
          if (summary.rejected <= MAX_REJECT_LOGS_PER_PASS) {
            logger.warn(
              { evt: "import_line_skipped", line: lineNumber, reason: result.reason, excerpt: redact(line) },
              "[import] Skipping invalid line"
            );
          }
          continue;
        }

        // Re-reading the whole log each pass means old lines come back every time.
        // Storing them only for eviction to delete them again would count them as new.
        if (result.record.timestamp < cutoff) {
          summary.expired++;
          continue;
        }

        if (this.store.upsertIfAbsent(result.record)) {
          summary.inserted++;
        } else {
          summary.duplicates++;
        }
      }

      summary.evicted = this.store.evictOlderThan(cutoff);
    });

    if (summary.rejected > MAX_REJECT_LOGS_PER_PASS) {
      logger.warn(
        { rejected: summary.rejected, logged: MAX_REJECT_LOGS_PER_PASS },
        "[import] More invalid lines were skipped than logged"
      );
    }

    logger.debug({ ...summary, cutoff }, "[import] batch processed");
    return summary;
  }

  /**
   * Import the configured metrics log. A missing log is "no data yet": the pass
   * still applies retention and reports zero inserts with `sourceMissing: true`.
   */
  async importFile(now?: Date): Promise<ImportSummary> {
    const lines = await this.readSourceLines();
    if (lines === null) {
      logger.debug({ metricsFile: this.metricsFile }, "[import] metrics file not found, nothing to import");
      const summary = this.importBatch([], now);
      return { ...summary, sourceMissing: true };
    }
    return this.importBatch(lines, now);
  }

  private async readSourceLines(): Promise<string[] | null> {
    try {
      const content = await readFile(this.metricsFile, "utf8");
      return content.split(/\r?\n/);
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }
}
