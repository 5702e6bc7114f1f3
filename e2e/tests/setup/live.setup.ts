// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/setup/live`
 * Purpose: Gate for the live projects: the configured listing must answer before smoke and journey specs run.
 * Scope: One HTTP request to LISTING_URL. Does not open a browser.
 * Invariants: smoke and journeys depend on this project; fixtures does not.
 * Side-effects: IO (network)
 * Links: playwright.config.ts
 * @internal
 */

import { expect, test as setup } from "@playwright/test";

import { suiteEnv } from "@/shared";

setup("target listing responds", async ({ request }) => {
  const env = suiteEnv();
  const response = await request.get(env.LISTING_URL, { timeout: env.SLOW_TIMEOUT_MS });
  expect(response.status(), `GET ${env.LISTING_URL}`).toBeLessThan(400);
});
