// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/components/wishlist`
 * Purpose: Wishlist button on a listing row and the panel it opens.
 * Scope: Adds a row to the wishlist and checks the panel. Does not open the application form.
 * Invariants: Both operations report failure as false; a disabled button is never clicked.
 * Side-effects: IO (browser, screenshots)
 * Links: src/pages/apartment-listing.page.ts
 * @public
 */

import type { Locator, Page } from "@playwright/test";

import { isDisabledClass } from "@/core";
import { describeError, LISTING, WISHLIST } from "@/shared";

import { ElementInteractor, type PageDeps } from "../support";

export class WishlistComponent {
  private readonly interactor: ElementInteractor;

  constructor(
    private readonly page: Page,
    private readonly deps: PageDeps
  ) {
    this.interactor = new ElementInteractor(page, deps.log, deps.timings);
  }

  async addApartment(row: Locator): Promise<boolean> {
    try {
      for (const button of await row.locator(LISTING.rowWishlistButton).all()) {
        if (!(await button.isVisible())) continue;
        if (isDisabledClass(await button.getAttribute("class"))) {
          this.deps.log.info("wishlist button is disabled");
          return false;
        }
        await this.interactor.highlight(button, "yellow");
        await button.click();
        await this.interactor.settle();
        await this.deps.screenshots.capture(this.page, "03_added_to_wishlist");
        this.deps.log.info("apartment added to wishlist");
        return true;
      }
      this.deps.log.info("no wishlist button on the row");
      return false;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "failed to add to wishlist");
      return false;
    }
  }

  async verifyWishlistPanel(): Promise<boolean> {
    for (const selector of WISHLIST.panel) {
      try {
        const panel = this.page.locator(selector).first();
        await panel.waitFor({ state: "visible", timeout: this.deps.timings.defaultTimeoutMs });
        await this.deps.screenshots.capture(this.page, "03b_wishlist_panel");
        this.deps.log.info({ selector }, "wishlist panel visible");
        return true;
      } catch {
        this.deps.log.debug({ selector }, "wishlist panel selector not visible");
      }
    }
    this.deps.log.warn("wishlist panel not detected");
    return false;
  }
}
