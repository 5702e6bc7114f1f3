// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/helpers/global-setup`
 * Purpose: Global setup for Playwright runs: validates the suite env once and logs the targets.
 * Scope: Runs once before all projects. Reachability of the target site is checked by the live-setup project, not here.
 * Invariants: An invalid env aborts the run before any browser starts.
 * Side-effects: process.env, IO (log output)
 * Notes: Used by playwright.config.ts globalSetup option.
 * Links: playwright.config.ts, e2e/tests/setup/live.setup.ts
 * @internal
 */

import type { FullConfig } from "@playwright/test";

import { makeLogger, suiteEnv } from "@/shared";

export default async function globalSetup(config: FullConfig): Promise<void> {
  const env = suiteEnv();
  const log = makeLogger({ component: "global-setup" });

  log.info(
    {
      ci: !!process.env.CI,
      projects: config.projects.map((p) => p.name),
      listingUrl: env.LISTING_URL,
      adminUrl: env.ADMIN_URL,
      adminJourneys: env.hasAdminCredentials ? "enabled" : "skipped",
    },
    "playwright setup"
  );
}
