// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/pages/listing`
 * Purpose: Listing page object and wishlist component against the local listing fixture.
 * Scope: Row discovery, selection, detail parsing, wishlist button and panel. Does not open the form.
 * Invariants: No request leaves the fixture hosts.
 * Side-effects: IO (browser, screenshots)
 * Links: src/pages/apartment-listing.page.ts, src/pages/components/wishlist.component.ts, e2e/fixtures/listing.html
 * @internal
 */

import path from "node:path";

import { ApartmentListingPage, WishlistComponent } from "@/pages";
import type { Rng } from "@/ports";

import { expect, test } from "../../helpers/fixtures";

const lastPick: Rng = { next: () => 0.99 };

test.describe("Apartment listing", () => {
  test("finds rows, prefers an enabled one and parses its details", async ({
    page,
    deps,
    fixtureSite,
  }) => {
    const listing = new ApartmentListingPage(page, deps, fixtureSite.url("/"));
    await listing.navigate();

    const rows = await listing.findAvailableApartments();
    expect(rows).toHaveLength(2);

    // B202's button is disabled, so even the last pick lands on A101
    const selected = await listing.selectRandomApartment(rows, lastPick);
    expect(await listing.extractApartmentDetails(selected)).toEqual({
      fullText: "A101 3.5 rooms CHF 2,150 82 m² Available Wishlist",
      rooms: "3.5",
      price: "CHF2,150",
      size: "82m²",
      status: "Available",
      apartmentId: "A101",
    });

    expect(deps.screenshots.captured.map((p) => path.basename(p))).toEqual([
      "01_homepage.png",
      "02_apartment_selected.png",
    ]);
  });

  test("throws when the page has no apartment rows", async ({ page, deps }) => {
    await page.setContent("<p>No listings right now</p>");
    const listing = new ApartmentListingPage(page, deps, "about:blank");

    await expect(listing.findAvailableApartments()).rejects.toThrow(
      "No available apartments found on the page"
    );
    expect(deps.screenshots.captured.map((p) => path.basename(p))).toEqual([
      "error_no_apartments.png",
    ]);
  });
});

test.describe("Wishlist", () => {
  test("skips a disabled button and opens the panel for an enabled one", async ({
    page,
    deps,
    fixtureSite,
  }) => {
    await new ApartmentListingPage(page, deps, fixtureSite.url("/")).navigate();
    const wishlist = new WishlistComponent(page, deps);

    expect(await wishlist.addApartment(page.locator("tr[data-apartment-id='B202']"))).toBe(false);
    await expect(page.locator(".apartments-table-wishlist")).toBeHidden();

    expect(await wishlist.addApartment(page.locator("tr[data-apartment-id='A101']"))).toBe(true);
    expect(await wishlist.verifyWishlistPanel()).toBe(true);
    await expect(page.locator("#wishlist-items")).toHaveText("A101");
  });

  test("reports a missing panel as false", async ({ page, deps }) => {
    await page.setContent("<table><tr><td>C303</td></tr></table>");
    expect(await new WishlistComponent(page, deps).verifyWishlistPanel()).toBe(false);
  });
});
