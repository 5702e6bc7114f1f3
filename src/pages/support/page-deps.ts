// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/support/page-deps`
 * Purpose: Collaborators every page object receives.
 * Scope: Type plus a constructor helper.
 * Invariants: One ScreenshotManager per run so captured paths accumulate in order.
 * Side-effects: none
 * @public
 */

import type { Logger, SuiteTimings } from "@/shared";

import { ScreenshotManager } from "./screenshot-manager";

export interface PageDeps {
  log: Logger;
  screenshots: ScreenshotManager;
  timings: SuiteTimings;
}

export function makePageDeps(
  log: Logger,
  timings: SuiteTimings,
  screenshotDir: string
): PageDeps {
  return { log, timings, screenshots: new ScreenshotManager(screenshotDir, log) };
}
