// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global unit test environment: test NODE_ENV and a fresh suite env cache per test.
 * Scope: Sets env vars and resets the cached suite env. Does NOT mock page objects or browsers.
 * Invariants: Unit tests see NODE_ENV=test; a test that changes process.env never leaks a parsed env into the next one.
 * Side-effects: process.env
 * Links: vitest.config.mts, src/shared/env/suite.ts
 * @public
 */

import { afterEach, beforeAll } from "vitest";

import { resetSuiteEnv } from "@/shared/env";

/**
 * Unit tests: no I/O, no browser, no RNG (use _fakes).
 */
beforeAll(() => {
  Object.assign(process.env, {
    NODE_ENV: "test",
    PINO_LOG_LEVEL: "error",
  });
});

afterEach(() => {
  resetSuiteEnv();
});
