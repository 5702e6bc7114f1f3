// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/application-form`
 * Purpose: Page object for opening the application form and completing step 1 (apartment requirements).
 * Scope: Apply-button popup or direct navigation, form detection, step 1 fields, save-and-next. Later steps live in their own page objects.
 * Invariants:
 * - After a successful navigation `currentPage` is the form page; later steps must use it.
 * - fillForm and submitForm wrap failures in ApplicationFormError after an error screenshot.
 * - verifySubmission is false only when a validation error is visible.
 * Side-effects: IO (browser, screenshots)
 * Links: src/pages/support/form-controls.ts, src/core/application/model.ts
 * @public
 */

import type { Page } from "@playwright/test";

import type { ParkingRequirements, RequirementsData } from "@/core";
import {
  ApplicationFormError,
  describeError,
  FORM,
  NavigationError,
  REQUIREMENTS,
  WISHLIST,
} from "@/shared";

import { ElementInteractor, FormControls, type PageDeps } from "./support";

export interface ApplicationUrls {
  applicationFormUrl: string;
  fallbackApplicationUrl: string;
}

const PARKING_COUNTERS = [
  ["field-parking_regular", "regularSpaces"],
  ["field-parking_small", "smallSpaces"],
  ["field-parking_large", "largeSpaces"],
  ["field-parking_electric", "electricSpaces"],
  ["field-parking_electric_small", "electricSmallSpaces"],
  ["field-parking_outdoor", "outdoorSpaces"],
  ["field-parking_special", "specialSpaces"],
] as const satisfies readonly (readonly [string, keyof ParkingRequirements])[];

export class ApplicationFormPage {
  private page: Page;

  constructor(
    page: Page,
    private readonly deps: PageDeps,
    private readonly urls: ApplicationUrls
  ) {
    this.page = page;
  }

  get currentPage(): Page {
    return this.page;
  }

  private get interactor(): ElementInteractor {
    return new ElementInteractor(this.page, this.deps.log, this.deps.timings);
  }

  private get controls(): FormControls {
    return new FormControls(this.page, this.deps.log, this.deps.timings);
  }

  /** Clicks the first visible Apply button on `listingPage` and adopts the popup it opens. */
  async navigateFromApplyButton(listingPage: Page): Promise<Page> {
    const listing = new ElementInteractor(listingPage, this.deps.log, this.deps.timings);
    const apply = await listing.firstVisible(WISHLIST.applyButtons);
    if (apply === undefined) {
      throw new NavigationError("Could not find Apply button");
    }

    await listing.highlight(apply);
    try {
      const [popup] = await Promise.all([
        listingPage.context().waitForEvent("page", { timeout: this.deps.timings.slowTimeoutMs }),
        apply.click(),
      ]);
      await popup.bringToFront();
      this.page = popup;
      this.deps.log.info({ url: popup.url() }, "application page opened");
      return popup;
    } catch (error) {
      throw new NavigationError(
        `Apply button did not open the application page: ${describeError(error)}`,
        error
      );
    }
  }

  /** Opens the primary form URL in a new tab, then the fallback URL. */
  async navigateDirect(): Promise<Page> {
    for (const url of [this.urls.applicationFormUrl, this.urls.fallbackApplicationUrl]) {
      const candidate = await this.page.context().newPage();
      try {
        await candidate.goto(url);
        await candidate.waitForLoadState("networkidle", {
          timeout: this.deps.timings.networkIdleTimeoutMs,
        });
        if ((await candidate.locator(FORM.directNavigationMarker).count()) > 0) {
          this.deps.log.info({ url }, "direct navigation worked");
          this.page = candidate;
          return candidate;
        }
        this.deps.log.info({ url }, "no form at url");
      } catch (error) {
        this.deps.log.info({ url, reason: describeError(error) }, "direct navigation failed");
      }
      await candidate.close();
    }
    throw new NavigationError("Failed to navigate to application form");
  }

  async verifyFormLoaded(): Promise<boolean> {
    try {
      await this.page.waitForLoadState("networkidle", {
        timeout: this.deps.timings.networkIdleTimeoutMs,
      });
      const found: string[] = [];
      for (const indicator of FORM.indicators) {
        if ((await this.page.locator(indicator).count()) > 0) found.push(indicator);
      }
      this.deps.log.info({ url: this.page.url(), indicators: found }, "form indicators");
      return found.length > 0;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "could not verify form");
      return false;
    }
  }

  /** Clicks a start button only when no form field is visible yet. */
  async startApplicationProcess(): Promise<boolean> {
    try {
      await this.page
        .locator(FORM.container)
        .first()
        .waitFor({ state: "attached", timeout: this.deps.timings.defaultTimeoutMs });

      const fields = await this.interactor.findVisible([FORM.fields]);
      if (fields.length > 0) {
        this.deps.log.info({ visibleFields: fields.length }, "form already active");
        return true;
      }

      const start = await this.interactor.firstVisible(FORM.startButtons);
      if (start !== undefined) {
        await start.click();
        await this.interactor.settle();
      }
      return true;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "could not start application");
      return false;
    }
  }

  async fillForm(data: RequirementsData): Promise<void> {
    try {
      await this.interactor.settle();
      await this.fillParking(data.parking);
      await this.fillVehicles(data);
      await this.fillSpaces(data);
      await this.fillWork(data);
      await this.controls.selectYesNo("obstacle_free", data.needsObstacleFree);

      await this.deps.screenshots.capture(this.page, "04_form_filled", true);
      this.deps.log.info("requirements step filled");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "form_filling");
      throw new ApplicationFormError(`Error filling form: ${describeError(error)}`, error);
    }
  }

  async submitForm(): Promise<void> {
    try {
      await this.controls.clickSubmit(this.deps.timings.slowTimeoutMs);
      this.deps.log.info("requirements step submitted");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "form_submission");
      throw new ApplicationFormError(`Error submitting form: ${describeError(error)}`, error);
    }
  }

  async verifySubmission(): Promise<boolean> {
    if (await this.controls.hasValidationErrors()) return false;

    for (const indicator of FORM.successIndicators) {
      if ((await this.page.locator(indicator).count()) > 0) {
        this.deps.log.info({ indicator }, "progressed to next step");
        return true;
      }
    }

    const url = this.page.url().toLowerCase();
    if (url.includes("household") || url.includes("step")) {
      this.deps.log.info({ url }, "url indicates progression");
    } else {
      this.deps.log.info({ url }, "submission status unclear");
    }
    return true;
  }

  private async fillParking(parking: ParkingRequirements): Promise<void> {
    if (!parking.wantsParking) {
      await this.controls.clickRadio("parking-false");
      return;
    }

    await this.controls.clickRadio("parking-true");
    await this.interactor.settle();
    for (const [fieldId, key] of PARKING_COUNTERS) {
      const spaces = parking[key];
      if (spaces > 0) await this.controls.incrementFromZero(fieldId, spaces);
    }
    if (parking.reason) {
      await this.interactor.fillField(REQUIREMENTS.parkingReason, parking.reason);
    }
  }

  private async fillVehicles(data: RequirementsData): Promise<void> {
    await this.controls.selectYesNo("car_sharing", data.wantsCarSharing);

    await this.controls.selectYesNo("motorbikes", data.wantsMotorbikeParking);
    if (data.wantsMotorbikeParking) {
      await this.interactor.settle();
      await this.controls.incrementFromZero("field-parking_motorbike", data.motorbikeSpaces);
    }

    await this.controls.selectYesNo("bicycles", data.wantsBikeParking);
    if (data.wantsBikeParking) {
      await this.interactor.settle();
      await this.controls.incrementFromZero("field-parking_bicycle", data.bikeSpaces);
      if (data.electricBikeSpaces > 0) {
        await this.controls.incrementFromZero(
          "field-parking_electric_bicycles",
          data.electricBikeSpaces
        );
      }
    }
  }

  private async fillSpaces(data: RequirementsData): Promise<void> {
    await this.controls.selectYesNo("wants_addroom", data.wantsAdditionalRoom);
    if (data.wantsAdditionalRoom) {
      await this.interactor.settle();
      if (data.additionalRoomPurpose) {
        await this.interactor.fillField(REQUIREMENTS.additionalRoomUse, data.additionalRoomPurpose);
      }
      if (data.additionalRoomArea) {
        await this.interactor.fillField(REQUIREMENTS.additionalRoomArea, data.additionalRoomArea);
      }
    }

    await this.controls.selectYesNo("wants_stockroom", data.wantsStorageRoom);
    if (data.wantsStorageRoom) {
      await this.interactor.settle();
      if (data.storageRoomPurpose) {
        await this.interactor.fillField(REQUIREMENTS.storageRoomUse, data.storageRoomPurpose);
      }
      if (data.storageRoomArea) {
        await this.interactor.fillField(REQUIREMENTS.storageRoomArea, data.storageRoomArea);
      }
    }

    await this.controls.selectYesNo("wants_workshop", data.wantsWorkshop);
    if (data.wantsWorkshop && data.workshopPurpose) {
      await this.interactor.settle();
      await this.interactor.fillField(REQUIREMENTS.workshopUse, data.workshopPurpose);
    }
  }

  private async fillWork(data: RequirementsData): Promise<void> {
    await this.controls.selectYesNo("wants_coworking", data.wantsCoworking);
    await this.controls.selectYesNo("wants_homeoffice", data.wantsHomeOffice);
    if (data.wantsHomeOffice && data.homeOfficeReason) {
      await this.interactor.settle();
      await this.interactor.fillField(REQUIREMENTS.homeOfficeDetail, data.homeOfficeReason);
    }
  }
}
