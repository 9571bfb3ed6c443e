/**
 * WHAT: Proves Sentry stays off without a usable DSN and that capture helpers no-op when disabled.
 * HOW: Calls the helpers directly; initializeSentry never enables under Vitest.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  redact: (value: string) => value,
}));

import { loadConfig } from "../../src/lib/env.js";
import {
  captureException,
  flushSentry,
  hasValidDsn,
  initializeSentry,
  isSentryEnabled,
} from "../../src/lib/sentry.js";

describe("hasValidDsn", () => {
  it.each([
    ["https://public@sentry.example.com/1", true],
    ["http://public@localhost:9000/42", true],
    ["https://sentry.example.com/1", false],
    ["https://public@sentry.example.com/", false],
    ["ftp://public@sentry.example.com/1", false],
    ["not a url", false],
    ["", false],
    [undefined, false],
  ])("%s → %s", (dsn, expected) => {
    expect(hasValidDsn(dsn)).toBe(expected);
  });
});

describe("Sentry when disabled", () => {
  it("does not initialize under the test runner, even with a DSN", () => {
    initializeSentry(loadConfig({ SENTRY_DSN: "https://public@sentry.example.com/1" }));
    expect(isSentryEnabled()).toBe(false);
  });

  it("captureException returns null", () => {
    expect(captureException(new Error("boom"), { scheduler: "metricsImport" })).toBeNull();
  });

  it("flushSentry resolves true without waiting", async () => {
    await expect(flushSentry(10)).resolves.toBe(true);
  });
});
