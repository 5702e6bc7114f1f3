// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/config/timings`
 * Purpose: Verifies wait budgets derived from the suite env and the zero-delay preset.
 * Scope: Pure mapping from env to SuiteTimings.
 * Side-effects: process.env
 * Links: src/shared/config/timings.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { INSTANT_TIMINGS, timingsFromEnv } from "@/shared/config";

const ORIGINAL_ENV = { ...process.env };

beforeEach(() => {
  process.env = { ...ORIGINAL_ENV };
});

afterEach(() => {
  process.env = ORIGINAL_ENV;
});

describe("shared/config/timings", () => {
  it("maps each env budget onto its timing", () => {
    Object.assign(process.env, {
      DEFAULT_TIMEOUT_MS: "3000",
      SLOW_TIMEOUT_MS: "9000",
      NETWORK_IDLE_TIMEOUT_MS: "8000",
      SETTLE_MS: "100",
      HIGHLIGHT_MS: "0",
      TYPING_DELAY_MS: "5",
    });

    expect(timingsFromEnv()).toEqual({
      defaultTimeoutMs: 3_000,
      slowTimeoutMs: 9_000,
      networkIdleTimeoutMs: 8_000,
      settleMs: 100,
      highlightMs: 0,
      typingDelayMs: 5,
    });
  });

  it("has no pauses in the instant preset", () => {
    expect(INSTANT_TIMINGS.settleMs).toBe(0);
    expect(INSTANT_TIMINGS.highlightMs).toBe(0);
    expect(INSTANT_TIMINGS.typingDelayMs).toBe(0);
    expect(INSTANT_TIMINGS.defaultTimeoutMs).toBeGreaterThan(0);
  });
});
