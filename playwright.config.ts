// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `playwright.config`
 * Purpose: Playwright projects for the page-object fixtures and the live journeys.
 * Scope: `fixtures` runs page objects against local HTML; `smoke` and `journeys` drive the configured target site after `live-setup` passes.
 * Invariants: Only `live-setup`, `smoke` and `journeys` reach the network; all artifacts land under e2e/artifacts.
 * Side-effects: process.env
 * Links: e2e/helpers/fixtures.ts, e2e/helpers/global-setup.ts, src/shared/env/suite.ts
 * @public
 */

import { defineConfig, devices } from "@playwright/test";

import { INSTANT_TIMINGS, suiteEnv, timingsFromEnv } from "@/shared";

import type { SuiteOptions } from "./e2e/helpers/fixtures";

const isCI = !!process.env.CI;
const env = suiteEnv();

export default defineConfig<SuiteOptions>({
  testDir: "e2e/tests",
  forbidOnly: isCI,
  retries: 0,
  reporter: [
    ["html", { outputFolder: "e2e/artifacts/report", open: "never" }],
    ["list"],
  ],
  outputDir: "e2e/artifacts/test-results",
  globalSetup: "./e2e/helpers/global-setup.ts",
  use: {
    ...devices["Desktop Chrome"],
    headless: env.HEADLESS,
    launchOptions: { slowMo: env.SLOW_MO_MS },
    trace: "retain-on-failure",
    screenshot: "only-on-failure",
  },
  projects: [
    {
      name: "fixtures",
      testMatch: ["**/pages/**/*.spec.ts"],
      use: { timings: INSTANT_TIMINGS },
    },
    {
      name: "live-setup",
      testMatch: /live\.setup\.ts/,
    },
    {
      name: "smoke",
      testMatch: ["**/smoke/**/*.spec.ts"],
      dependencies: ["live-setup"],
      use: { timings: timingsFromEnv(), screenshotDir: env.SCREENSHOT_DIR },
    },
    {
      name: "journeys",
      testMatch: ["**/journeys/**/*.spec.ts"],
      dependencies: ["live-setup"],
      fullyParallel: false,
      timeout: 5 * 60_000,
      use: { timings: timingsFromEnv(), screenshotDir: env.SCREENSHOT_DIR },
    },
  ],
});
