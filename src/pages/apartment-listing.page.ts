// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/apartment-listing`
 * Purpose: Page object for the public apartment listing.
 * Scope: Loads the listing, collects apartment rows, picks one and reads its details. Does not add to the wishlist.
 * Invariants:
 * - findAvailableApartments throws ApartmentNotFoundError when no visible row looks like an apartment.
 * - selectRandomApartment prefers rows with an enabled wishlist button and falls back to all rows.
 * Side-effects: IO (browser, screenshots)
 * Links: src/core/listing/rules.ts, src/shared/config/selectors.ts
 * @public
 */

import type { Locator, Page } from "@playwright/test";

import {
  type ApartmentDetails,
  isApartmentRow,
  isDisabledClass,
  parseApartmentDetails,
  pick,
  rowLabel,
} from "@/core";
import type { Rng } from "@/ports";
import { ApartmentNotFoundError, describeError, LISTING } from "@/shared";

import { ElementInteractor, type PageDeps } from "./support";

export class ApartmentListingPage {
  private readonly interactor: ElementInteractor;

  constructor(
    private readonly page: Page,
    private readonly deps: PageDeps,
    private readonly listingUrl: string
  ) {
    this.interactor = new ElementInteractor(page, deps.log, deps.timings);
  }

  async navigate(): Promise<void> {
    this.deps.log.info({ url: this.listingUrl }, "opening listing");
    await this.page.goto(this.listingUrl);
    await this.page.waitForLoadState("networkidle", {
      timeout: this.deps.timings.networkIdleTimeoutMs,
    });
    await this.interactor.settle();
    await this.deps.screenshots.capture(this.page, "01_homepage");
  }

  async findAvailableApartments(): Promise<Locator[]> {
    const candidates = await this.interactor.findVisible(LISTING.apartmentRows);
    const apartments: Locator[] = [];
    for (const row of candidates) {
      try {
        const text = await row.textContent();
        if (text !== null && isApartmentRow(text)) apartments.push(row);
      } catch (error) {
        this.deps.log.warn({ reason: describeError(error) }, "could not read row");
      }
    }

    if (apartments.length === 0) {
      await this.deps.screenshots.captureError(this.page, "no_apartments");
      throw new ApartmentNotFoundError("No available apartments found on the page");
    }
    this.deps.log.info({ count: apartments.length }, "apartments found");
    return apartments;
  }

  async selectRandomApartment(rows: readonly Locator[], rng: Rng): Promise<Locator> {
    const clickable: Locator[] = [];
    for (const row of rows) {
      if (await this.hasEnabledWishlistButton(row)) {
        clickable.push(row);
        this.deps.log.debug({ apartment: rowLabel(await row.textContent()) }, "clickable apartment");
      }
    }

    let pool: readonly Locator[] = clickable;
    if (pool.length === 0) {
      this.deps.log.warn("no row has an enabled wishlist button, using all rows");
      pool = rows;
    }

    const selected = pick(rng, pool);
    await selected.evaluate((el) => {
      el.style.backgroundColor = "lightblue";
      el.style.border = "2px solid blue";
    });
    await selected.scrollIntoViewIfNeeded();
    await this.interactor.settle(this.deps.timings.highlightMs);

    this.deps.log.info({ options: pool.length }, "apartment selected");
    await this.deps.screenshots.capture(this.page, "02_apartment_selected");
    return selected;
  }

  async extractApartmentDetails(row: Locator): Promise<ApartmentDetails> {
    try {
      const details = parseApartmentDetails((await row.textContent()) ?? "");
      this.deps.log.info({ details }, "apartment details");
      return details;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "could not extract apartment details");
      return { fullText: "Error extracting details" };
    }
  }

  private async hasEnabledWishlistButton(row: Locator): Promise<boolean> {
    try {
      for (const button of await row.locator(LISTING.rowWishlistButton).all()) {
        if ((await button.isVisible()) && !isDisabledClass(await button.getAttribute("class"))) {
          return true;
        }
      }
      return false;
    } catch (error) {
      this.deps.log.debug({ reason: describeError(error) }, "wishlist button check failed");
      return false;
    }
  }
}
