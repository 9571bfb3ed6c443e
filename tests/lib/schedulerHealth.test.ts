/**
 * Backup Monitor — tests/lib/schedulerHealth.test.ts
 * WHAT: Tests for scheduler health tracking utility.
 * WHY: Verify health tracking, consecutive failure counting,
 *      and alert thresholds work correctly.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

// ===== Mock Setup =====

// Mock logger before importing schedulerHealth module
const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: mockLogger,
}));

// Import after mocks are set up
import {
  recordSchedulerRun,
  getSchedulerHealthByName,
  _clearAllSchedulerHealth,
  type SchedulerRunOutcome,
} from "../../src/lib/schedulerHealth.js";

const OK: SchedulerRunOutcome = { success: true, inserted: 0 };
const FAILED: SchedulerRunOutcome = { success: false, error: "SQLITE_BUSY: database is locked" };

// ===== Tests =====

describe("schedulerHealth", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    // Clear all scheduler health state between tests
    _clearAllSchedulerHealth();
  });

  describe("recordSchedulerRun", () => {
    it("creates new health entry on first run", () => {
      recordSchedulerRun("testScheduler", OK);

      const health = getSchedulerHealthByName("testScheduler");
      expect(health).toBeDefined();
      expect(health?.name).toBe("testScheduler");
      expect(health?.totalRuns).toBe(1);
      expect(health?.totalFailures).toBe(0);
      expect(health?.consecutiveFailures).toBe(0);
      expect(health?.lastRunAt).toBeGreaterThan(0);
      expect(health?.lastSuccessAt).toBeGreaterThan(0);
      expect(health?.lastErrorAt).toBeNull();
    });

    it("tracks success correctly", () => {
      recordSchedulerRun("testScheduler", OK);
      recordSchedulerRun("testScheduler", OK);

      const health = getSchedulerHealthByName("testScheduler");
      expect(health?.totalRuns).toBe(2);
      expect(health?.totalFailures).toBe(0);
      expect(health?.consecutiveFailures).toBe(0);
    });

    it("tracks failure correctly", () => {
      recordSchedulerRun("testScheduler", FAILED);

      const health = getSchedulerHealthByName("testScheduler");
      expect(health?.totalRuns).toBe(1);
      expect(health?.totalFailures).toBe(1);
      expect(health?.consecutiveFailures).toBe(1);
      expect(health?.lastErrorAt).toBeGreaterThan(0);
      expect(health?.lastSuccessAt).toBeNull();
    });

    it("increments consecutive failures on repeated failures", () => {
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", FAILED);

      const health = getSchedulerHealthByName("testScheduler");
      expect(health?.consecutiveFailures).toBe(3);
      expect(health?.totalFailures).toBe(3);
    });

    it("resets consecutive failures on success", () => {
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", OK);

      const health = getSchedulerHealthByName("testScheduler");
      expect(health?.consecutiveFailures).toBe(0);
      expect(health?.totalFailures).toBe(2);
      expect(health?.totalRuns).toBe(3);
    });

    it("logs alert at 3 consecutive failures", () => {
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", FAILED);

      // Should not have logged yet
      expect(mockLogger.error).not.toHaveBeenCalled();

      // Third failure should trigger alert
      recordSchedulerRun("testScheduler", FAILED);

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({
          scheduler: "testScheduler",
          consecutiveFailures: 3,
        }),
        "[scheduler] Multiple consecutive failures - requires attention"
      );
    });

    it("continues logging alert on subsequent failures", () => {
      for (let i = 0; i < 5; i++) {
        recordSchedulerRun("testScheduler", FAILED);
      }

      // Should have logged 3 times (at failures 3, 4, and 5)
      expect(mockLogger.error).toHaveBeenCalledTimes(3);
    });

    it("stops alerting after success resets failures", () => {
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", FAILED);

      // Reset via success
      recordSchedulerRun("testScheduler", OK);
      vi.clearAllMocks();

      // Two more failures should not trigger alert
      recordSchedulerRun("testScheduler", FAILED);
      recordSchedulerRun("testScheduler", FAILED);

      expect(mockLogger.error).not.toHaveBeenCalled();
    });
  });

  describe("run details", () => {
    it("records inserted count and duration of a successful pass", () => {
      recordSchedulerRun("metricsImport", { success: true, inserted: 7, durationMs: 42 });

      const health = getSchedulerHealthByName("metricsImport");
      expect(health?.lastInserted).toBe(7);
      expect(health?.lastDurationMs).toBe(42);
      expect(health?.lastError).toBeNull();
    });

    it("keeps the error message until the next success", () => {
      recordSchedulerRun("metricsImport", FAILED);
      expect(getSchedulerHealthByName("metricsImport")?.lastError).toBe("SQLITE_BUSY: database is locked");

      recordSchedulerRun("metricsImport", { success: true, inserted: 3 });
      const health = getSchedulerHealthByName("metricsImport");
      expect(health?.lastError).toBeNull();
      expect(health?.lastInserted).toBe(3);
      expect(health?.lastDurationMs).toBeNull();
    });

    it("includes the last error in the alert log", () => {
      recordSchedulerRun("metricsImport", FAILED);
      recordSchedulerRun("metricsImport", FAILED);
      recordSchedulerRun("metricsImport", FAILED);

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ lastError: "SQLITE_BUSY: database is locked", totalRuns: 3 }),
        "[scheduler] Multiple consecutive failures - requires attention"
      );
    });
  });

  describe("getSchedulerHealthByName", () => {
    it("returns undefined for unknown scheduler", () => {
      const health = getSchedulerHealthByName("unknown");
      expect(health).toBeUndefined();
    });

    it("returns health for known scheduler", () => {
      recordSchedulerRun("testScheduler", OK);

      const health = getSchedulerHealthByName("testScheduler");
      expect(health).toBeDefined();
      expect(health?.name).toBe("testScheduler");
    });

    it("returns a copy of the health object", () => {
      recordSchedulerRun("testScheduler", OK);

      const health1 = getSchedulerHealthByName("testScheduler");
      const health2 = getSchedulerHealthByName("testScheduler");

      expect(health1).not.toBe(health2);
    });
  });

  describe("_clearAllSchedulerHealth", () => {
    it("removes all tracked schedulers", () => {
      recordSchedulerRun("scheduler1", OK);
      recordSchedulerRun("scheduler2", OK);

      _clearAllSchedulerHealth();

      expect(getSchedulerHealthByName("scheduler1")).toBeUndefined();
      expect(getSchedulerHealthByName("scheduler2")).toBeUndefined();
    });
  });

  describe("timestamp tracking", () => {
    it("updates lastRunAt on each run", () => {
      recordSchedulerRun("testScheduler", OK);
      const health1 = getSchedulerHealthByName("testScheduler");
      const firstRunAt = health1?.lastRunAt;

      recordSchedulerRun("testScheduler", OK);
      const health2 = getSchedulerHealthByName("testScheduler");

      // lastRunAt should be >= firstRunAt (same or later timestamp)
      expect(health2?.lastRunAt).toBeGreaterThanOrEqual(firstRunAt ?? 0);
    });

    it("preserves lastSuccessAt after failure", () => {
      recordSchedulerRun("testScheduler", OK);
      const health1 = getSchedulerHealthByName("testScheduler");
      const successAt = health1?.lastSuccessAt;

      recordSchedulerRun("testScheduler", FAILED);
      const health2 = getSchedulerHealthByName("testScheduler");

      expect(health2?.lastSuccessAt).toBe(successAt);
    });

    it("preserves lastErrorAt after success", () => {
      recordSchedulerRun("testScheduler", FAILED);
      const health1 = getSchedulerHealthByName("testScheduler");
      const errorAt = health1?.lastErrorAt;

      recordSchedulerRun("testScheduler", OK);
      const health2 = getSchedulerHealthByName("testScheduler");

      expect(health2?.lastErrorAt).toBe(errorAt);
    });
  });
});
