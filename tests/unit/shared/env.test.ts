// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/env`
 * Purpose: Verifies suite env parsing: defaults, coercion, credential detection and the validation error shape.
 * Scope: Covers the Zod schema and cache behavior of suiteEnv. Does not launch browsers.
 * Invariants: process.env restored after each test; the cached env is dropped by tests/setup.ts.
 * Side-effects: process.env
 * Links: src/shared/env/suite.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  EnvValidationError,
  resetSuiteEnv,
  suiteEnv,
} from "@/shared/env";

const SUITE_KEYS = [
  "LISTING_URL",
  "APPLICATION_FORM_URL",
  "FALLBACK_APPLICATION_URL",
  "ADMIN_URL",
  "ADMIN_USERNAME",
  "ADMIN_PASSWORD",
  "DEFAULT_TIMEOUT_MS",
  "SLOW_TIMEOUT_MS",
  "NETWORK_IDLE_TIMEOUT_MS",
  "SETTLE_MS",
  "HIGHLIGHT_MS",
  "TYPING_DELAY_MS",
  "HEADLESS",
  "SLOW_MO_MS",
  "SCREENSHOT_DIR",
] as const;

const ORIGINAL_ENV = { ...process.env };

beforeEach(() => {
  process.env = { ...ORIGINAL_ENV };
  for (const key of SUITE_KEYS) delete process.env[key];
  process.env.NODE_ENV = "test";
});

afterEach(() => {
  process.env = ORIGINAL_ENV;
});

describe("shared/env/suite", () => {
  it("fills every timing and browser default", () => {
    const env = suiteEnv();

    expect(env.NODE_ENV).toBe("test");
    expect(env.DEFAULT_TIMEOUT_MS).toBe(5_000);
    expect(env.SLOW_TIMEOUT_MS).toBe(10_000);
    expect(env.NETWORK_IDLE_TIMEOUT_MS).toBe(10_000);
    expect(env.SETTLE_MS).toBe(1_000);
    expect(env.HIGHLIGHT_MS).toBe(500);
    expect(env.TYPING_DELAY_MS).toBe(50);
    expect(env.HEADLESS).toBe(true);
    expect(env.SLOW_MO_MS).toBe(0);
    expect(env.SCREENSHOT_DIR).toBe("e2e/artifacts/screenshots");
    expect(env.ADMIN_USERNAME).toBeUndefined();
    expect(env.hasAdminCredentials).toBe(false);
  });

  it("coerces numeric and boolean strings", () => {
    Object.assign(process.env, {
      DEFAULT_TIMEOUT_MS: "7000",
      SETTLE_MS: "0",
      HEADLESS: "0",
      SLOW_MO_MS: "250",
    });

    const env = suiteEnv();

    expect(env.DEFAULT_TIMEOUT_MS).toBe(7_000);
    expect(env.SETTLE_MS).toBe(0);
    expect(env.HEADLESS).toBe(false);
    expect(env.SLOW_MO_MS).toBe(250);
  });

  it("reports admin credentials only when both are set", () => {
    process.env.ADMIN_USERNAME = "test-admin";
    expect(suiteEnv().hasAdminCredentials).toBe(false);

    resetSuiteEnv();
    process.env.ADMIN_PASSWORD = "test-secret";
    expect(suiteEnv().hasAdminCredentials).toBe(true);
  });

  it("lists every invalid key in schema order", () => {
    Object.assign(process.env, {
      LISTING_URL: "not a url",
      SETTLE_MS: "-1",
      HEADLESS: "yes",
    });

    let caught: unknown;
    try {
      suiteEnv();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EnvValidationError);
    if (caught instanceof EnvValidationError) {
      expect(caught.meta).toEqual({
        code: "INVALID_ENV",
        missing: [],
        invalid: ["LISTING_URL", "SETTLE_MS", "HEADLESS"],
      });
      expect(caught.message).toContain("Invalid suite env:");
    }
  });

  it("caches the parsed env until reset", () => {
    process.env.SLOW_MO_MS = "10";
    const first = suiteEnv();

    process.env.SLOW_MO_MS = "20";
    expect(suiteEnv()).toBe(first);
    expect(suiteEnv().SLOW_MO_MS).toBe(10);

    resetSuiteEnv();
    expect(suiteEnv().SLOW_MO_MS).toBe(20);
  });
});
