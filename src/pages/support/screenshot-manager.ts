// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/support/screenshot-manager`
 * Purpose: Named screenshots of each journey step, plus full-page error captures.
 * Scope: Writes PNGs under one directory and remembers their paths. Does not attach them to Playwright reports.
 * Invariants: captureError never throws; a failed capture is logged and yields undefined.
 * Side-effects: IO (file system writes via Playwright)
 * Links: src/pages/support/page-deps.ts
 * @public
 */

import path from "node:path";

import type { Page } from "@playwright/test";

import { describeError, type Logger } from "@/shared";

export class ScreenshotManager {
  private readonly paths: string[] = [];

  constructor(
    private readonly baseDir: string,
    private readonly log: Logger
  ) {}

  get captured(): readonly string[] {
    return this.paths;
  }

  async capture(page: Page, name: string, fullPage = false): Promise<string> {
    const filePath = path.join(this.baseDir, `${name}.png`);
    await page.screenshot({ path: filePath, fullPage });
    this.paths.push(filePath);
    this.log.debug({ screenshot: filePath }, "screenshot captured");
    return filePath;
  }

  async captureError(page: Page, context: string): Promise<string | undefined> {
    try {
      return await this.capture(page, `error_${context}`, true);
    } catch (error) {
      this.log.warn({ context, reason: describeError(error) }, "error screenshot failed");
      return undefined;
    }
  }
}
