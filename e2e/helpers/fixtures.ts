// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/helpers/fixtures`
 * Purpose: Playwright test fixtures shared by every test file: logger, page dependencies and the local fixture site.
 * Scope: Options `timings` and `screenshotDir` (set per project), per-test `log` and `deps`, and `fixtureSite`.
 * Invariants: Once `fixtureSite` is used, every request outside the fixture hosts is aborted.
 * Side-effects: IO (file reads via route.fulfill)
 * Links: playwright.config.ts, e2e/fixtures/*.html
 * @public
 */

import path from "node:path";

import { type BrowserContext, test as base } from "@playwright/test";

import { makePageDeps, type PageDeps } from "@/pages";
import { INSTANT_TIMINGS, type Logger, makeLogger, type SuiteTimings } from "@/shared";

export const FIXTURE_HOST = "https://rental.fixtures.test";
export const FIXTURE_ADMIN_HOST = "https://admin.fixtures.test";

const FIXTURE_DIR = path.resolve(__dirname, "../fixtures");

/** Path on a fixture host → HTML file under e2e/fixtures. */
const FIXTURE_PAGES: Record<string, string> = {
  [`${FIXTURE_HOST}/`]: "listing.html",
  [`${FIXTURE_HOST}/form`]: "application-form.html",
  [`${FIXTURE_ADMIN_HOST}/login`]: "admin-login.html",
  [`${FIXTURE_ADMIN_HOST}/applications`]: "admin-applications.html",
};

export interface SuiteOptions {
  timings: SuiteTimings;
  /** Empty means the test's own output directory. */
  screenshotDir: string;
}

export interface FixtureSite {
  url(pathname: string): string;
  adminUrl(pathname: string): string;
}

interface SuiteFixtures {
  log: Logger;
  deps: PageDeps;
  fixtureSite: FixtureSite;
}

async function serveFixtures(context: BrowserContext): Promise<void> {
  await context.route("**/*", (route) => route.abort());
  for (const host of [FIXTURE_HOST, FIXTURE_ADMIN_HOST]) {
    await context.route(`${host}/**`, async (route) => {
      const { origin, pathname } = new URL(route.request().url());
      const file = FIXTURE_PAGES[`${origin}${pathname}`];
      if (file === undefined) {
        await route.fulfill({ status: 404, contentType: "text/plain", body: "not found" });
        return;
      }
      await route.fulfill({ path: path.join(FIXTURE_DIR, file), contentType: "text/html" });
    });
  }
}

export const test = base.extend<SuiteOptions & SuiteFixtures>({
  timings: [INSTANT_TIMINGS, { option: true }],
  screenshotDir: ["", { option: true }],

  log: async ({}, use, testInfo) => {
    await use(makeLogger({ test: testInfo.titlePath.join(" > ") }));
  },

  deps: async ({ log, timings, screenshotDir }, use, testInfo) => {
    const dir = screenshotDir
      ? path.join(screenshotDir, testInfo.titlePath.slice(1).join("_").replace(/\W+/g, "_"))
      : testInfo.outputPath("screenshots");
    await use(makePageDeps(log, timings, dir));
  },

  fixtureSite: async ({ context }, use) => {
    await serveFixtures(context);
    await use({
      url: (pathname) => `${FIXTURE_HOST}${pathname}`,
      adminUrl: (pathname) => `${FIXTURE_ADMIN_HOST}${pathname}`,
    });
  },
});

export { expect } from "@playwright/test";
