// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@flows/application-journey`
 * Purpose: The applicant journey from the listing to a submitted application.
 * Scope: listing → wishlist → apply (popup, else direct URL) → requirements → household → people → summary.
 * Invariants:
 * - Never throws for journey failures; they come back as a RunResult with status "error".
 * - A wishlist-only run ends with status "pending".
 * - screenshotPaths lists every capture of the run in order.
 * Side-effects: IO (browser, screenshots)
 * Links: src/pages/**, src/core/application/model.ts
 * @public
 */

import type { BrowserContext, Page } from "@playwright/test";

import type {
  ApartmentDetails,
  ApplicationStatus,
  PersonData,
  RequirementsData,
  RunResult,
} from "@/core";
import {
  ApartmentListingPage,
  ApplicationFormPage,
  type ApplicationUrls,
  HouseholdFormPage,
  type PageDeps,
  PeopleFormPage,
  SummaryFormPage,
  WishlistComponent,
} from "@/pages";
import type { Rng } from "@/ports";
import {
  ApplicationFormError,
  describeError,
  isSuiteError,
  logPhase,
} from "@/shared";

export interface JourneyUrls extends ApplicationUrls {
  listingUrl: string;
}

export interface JourneyOptions {
  urls: JourneyUrls;
  rng: Rng;
  requirements: RequirementsData;
  family: readonly PersonData[];
  /** Stop after the wishlist step. */
  wishlistOnly?: boolean;
}

export async function runApplicationJourney(
  context: BrowserContext,
  deps: PageDeps,
  options: JourneyOptions
): Promise<RunResult> {
  const startedAt = Date.now();
  const { log, screenshots } = deps;
  let current: Page = await context.newPage();
  let apartmentDetails: ApartmentDetails | undefined;

  try {
    const listingPage = current;
    const listing = new ApartmentListingPage(listingPage, deps, options.urls.listingUrl);
    const selected = await logPhase(log, "apartment selection", async () => {
      await listing.navigate();
      const rows = await listing.findAvailableApartments();
      const row = await listing.selectRandomApartment(rows, options.rng);
      apartmentDetails = await listing.extractApartmentDetails(row);
      return row;
    });

    await logPhase(log, "wishlist", async () => {
      const wishlist = new WishlistComponent(listingPage, deps);
      if (await wishlist.addApartment(selected)) {
        await wishlist.verifyWishlistPanel();
      }
    });

    if (options.wishlistOnly) {
      return finish("pending");
    }

    const form = new ApplicationFormPage(listingPage, deps, options.urls);
    current = await logPhase(log, "application navigation", async () => {
      try {
        return await form.navigateFromApplyButton(listingPage);
      } catch (error) {
        log.warn({ reason: describeError(error) }, "apply button failed, navigating directly");
        return form.navigateDirect();
      }
    });

    await logPhase(log, "requirements step", async () => {
      if (!(await form.verifyFormLoaded())) {
        throw new ApplicationFormError("Application form did not load");
      }
      await form.startApplicationProcess();
      await form.fillForm(options.requirements);
      await form.submitForm();
      if (!(await form.verifySubmission())) {
        throw new ApplicationFormError("Requirements step was rejected by validation");
      }
    });

    await logPhase(log, "household step", async () => {
      const household = new HouseholdFormPage(current, deps);
      if (!(await household.verifyHouseholdFormLoaded())) {
        throw new ApplicationFormError("Household step did not load");
      }
      await household.fillHouseholdForm(options.requirements.household);
      await household.submitHouseholdForm();
      if (!(await household.verifyHouseholdSubmission())) {
        throw new ApplicationFormError("Household step was rejected by validation");
      }
    });

    await logPhase(
      log,
      "people step",
      () => new PeopleFormPage(current, deps).fillPeopleForm(options.family),
      { people: options.family.length }
    );

    await logPhase(log, "summary step", () => new SummaryFormPage(current, deps).fillSummaryForm());
    return finish("submitted");
  } catch (error) {
    if (!isSuiteError(error)) {
      await screenshots.captureError(current, "journey");
    }
    return finish("error", describeError(error));
  }

  function finish(status: ApplicationStatus, errorMessage?: string): RunResult {
    const success = status !== "error";
    const result: RunResult = {
      success,
      status,
      screenshotPaths: [...screenshots.captured],
      apartmentDetails,
      durationMs: Date.now() - startedAt,
    };
    if (errorMessage !== undefined) result.errorMessage = errorMessage;
    log.info({ success, durationMs: result.durationMs }, "journey finished");
    return result;
  }
}
