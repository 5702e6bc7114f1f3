// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/support/element-interactor`
 * Purpose: Clicks, typing and lookups that tolerate the target site's late rendering and selector drift.
 * Scope: Retrying click, clear-and-type fill, visible lookup across a selector chain, visual highlight. Does not know about form steps.
 * Invariants:
 * - clickWithRetry and fillField report failure as false instead of throwing.
 * - findVisible returns the matches of the first chain entry that has any visible match.
 * Side-effects: IO (browser interaction), time
 * Links: src/shared/config/selectors.ts
 * @public
 */

import type { Locator, Page } from "@playwright/test";

import { describeError, type Logger, type SuiteTimings } from "@/shared";

export type LocatorRoot = Page | Locator;

export interface FillOptions {
  clear?: boolean;
  /** Per-keystroke delay in ms; defaults to the suite's typing delay. */
  delay?: number;
}

export class ElementInteractor {
  constructor(
    private readonly page: Page,
    private readonly log: Logger,
    private readonly timings: SuiteTimings
  ) {}

  async settle(ms: number = this.timings.settleMs): Promise<void> {
    if (ms > 0) await this.page.waitForTimeout(ms);
  }

  async clickWithRetry(selector: string, maxAttempts = 3): Promise<boolean> {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const target = this.page.locator(`${selector} >> visible=true`).first();
        await target.waitFor({ state: "visible", timeout: this.timings.defaultTimeoutMs });
        await target.click({ timeout: this.timings.defaultTimeoutMs });
        await this.settle();
        return true;
      } catch (error) {
        this.log.warn({ selector, attempt, reason: describeError(error) }, "click attempt failed");
        if (attempt < maxAttempts) await this.settle();
      }
    }
    return false;
  }

  async fillField(selector: string, value: string, options: FillOptions = {}): Promise<boolean> {
    const { clear = true, delay = this.timings.typingDelayMs } = options;
    try {
      const field = this.page.locator(selector).first();
      await field.waitFor({ state: "visible", timeout: this.timings.defaultTimeoutMs });
      if (clear) await field.fill("");
      await field.pressSequentially(value, { delay });
      return true;
    } catch (error) {
      this.log.error({ selector, reason: describeError(error) }, "failed to fill field");
      return false;
    }
  }

  async findVisible(selectors: readonly string[], root: LocatorRoot = this.page): Promise<Locator[]> {
    for (const selector of selectors) {
      try {
        const visible: Locator[] = [];
        for (const candidate of await root.locator(selector).all()) {
          if (await candidate.isVisible()) visible.push(candidate);
        }
        if (visible.length > 0) {
          this.log.debug({ selector, count: visible.length }, "found visible elements");
          return visible;
        }
      } catch (error) {
        this.log.warn({ selector, reason: describeError(error) }, "selector failed");
      }
    }
    return [];
  }

  /** First chain entry with a visible match, for callers that retry by selector. */
  async visibleSelector(
    selectors: readonly string[],
    root: LocatorRoot = this.page
  ): Promise<string | undefined> {
    for (const selector of selectors) {
      try {
        if ((await root.locator(`${selector} >> visible=true`).count()) > 0) return selector;
      } catch (error) {
        this.log.warn({ selector, reason: describeError(error) }, "selector failed");
      }
    }
    return undefined;
  }

  async firstVisible(selectors: readonly string[], root: LocatorRoot = this.page): Promise<Locator | undefined> {
    const [first] = await this.findVisible(selectors, root);
    return first;
  }

  /** One locator matching any chain entry. */
  anyOf(selectors: readonly string[], root: LocatorRoot = this.page): Locator {
    return selectors
      .map((selector) => root.locator(selector))
      .reduce((combined, next) => combined.or(next));
  }

  /** Waits up to `timeoutMs` for any chain entry to become visible, then returns the first in chain order. */
  async waitForVisible(selectors: readonly string[], timeoutMs: number): Promise<Locator | undefined> {
    try {
      await this.anyOf(selectors.map((s) => `${s} >> visible=true`))
        .first()
        .waitFor({ state: "visible", timeout: timeoutMs });
    } catch {
      this.log.debug({ selectors }, "nothing visible in time");
      return undefined;
    }
    return this.firstVisible(selectors);
  }

  /** Waits for the first chain entry that becomes attached within `timeoutMs`. */
  async waitForAny(selectors: readonly string[], timeoutMs: number): Promise<string | undefined> {
    for (const selector of selectors) {
      try {
        await this.page.locator(selector).first().waitFor({ state: "attached", timeout: timeoutMs });
        return selector;
      } catch {
        this.log.debug({ selector }, "selector not present");
      }
    }
    return undefined;
  }

  async highlight(target: Locator, color = "red"): Promise<void> {
    await target.evaluate((el, c) => {
      el.style.border = `3px solid ${c}`;
    }, color);
    await this.settle(this.timings.highlightMs);
  }
}
