// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/household-form`
 * Purpose: Page object for step 2 (household).
 * Scope: General, moving, security deposit, motivation and additional sections; custom dropdowns; save-and-next.
 * Invariants:
 * - Absent HouseholdData fields are left untouched.
 * - Dropdowns select by data-value when the label is known, else by option text.
 * Side-effects: IO (browser, screenshots)
 * Links: src/core/application/dropdowns.ts, src/shared/config/selectors.ts (HOUSEHOLD)
 * @public
 */

import type { Page } from "@playwright/test";

import {
  dataValueFor,
  type HouseholdData,
  type HouseholdDropdown,
  pickOptionByText,
} from "@/core";
import {
  ApplicationFormError,
  describeError,
  ElementInteractionError,
  HOUSEHOLD,
  STEPS,
} from "@/shared";

import { ElementInteractor, FormControls, type PageDeps } from "./support";

export class HouseholdFormPage {
  private readonly interactor: ElementInteractor;
  private readonly controls: FormControls;

  constructor(
    private readonly page: Page,
    private readonly deps: PageDeps
  ) {
    this.interactor = new ElementInteractor(page, deps.log, deps.timings);
    this.controls = new FormControls(page, deps.log, deps.timings);
  }

  async verifyHouseholdFormLoaded(): Promise<boolean> {
    try {
      if (!(await this.controls.isStepActive(STEPS.household))) {
        this.deps.log.warn("household step is not active");
        return false;
      }
      if ((await this.page.locator(HOUSEHOLD.toggles.householdType).count()) === 0) {
        this.deps.log.warn("household type dropdown not found");
        return false;
      }
      return true;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "could not verify household form");
      return false;
    }
  }

  async fillHouseholdForm(data: HouseholdData): Promise<void> {
    try {
      await this.interactor.settle();
      await this.fillGeneral(data);
      await this.fillMoving(data);
      await this.fillSecurityDeposit(data);
      await this.fillMotivation(data);
      await this.fillAdditional(data);

      await this.deps.screenshots.capture(this.page, "05_household_form_filled", true);
      this.deps.log.info("household step filled");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "household_form_filling");
      throw new ApplicationFormError(
        `Error filling household form: ${describeError(error)}`,
        error
      );
    }
  }

  async submitHouseholdForm(): Promise<void> {
    try {
      await this.controls.clickSubmit();
      this.deps.log.info("household step submitted");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "household_form_submission");
      throw new ApplicationFormError(
        `Error submitting household form: ${describeError(error)}`,
        error
      );
    }
  }

  async verifyHouseholdSubmission(): Promise<boolean> {
    if (await this.controls.isStepActive(STEPS.people)) {
      this.deps.log.info("progressed to people step");
      return true;
    }
    if (await this.controls.hasValidationErrors()) return false;

    const url = this.page.url().toLowerCase();
    if (url.includes("people") || url.includes("step")) {
      this.deps.log.info({ url }, "url indicates progression");
    } else {
      this.deps.log.info({ url }, "household submission status unclear");
    }
    return true;
  }

  async selectDropdownOption(dropdown: HouseholdDropdown, label: string): Promise<void> {
    const toggle = HOUSEHOLD.toggles[dropdown];
    try {
      await this.page.locator(toggle).click({ timeout: this.deps.timings.defaultTimeoutMs });
      await this.interactor.settle();
      await this.page
        .locator(`${HOUSEHOLD.dropdownItems}:visible`)
        .first()
        .waitFor({ state: "visible", timeout: this.deps.timings.defaultTimeoutMs });

      const dataValue = dataValueFor(dropdown, label);
      if (dataValue !== undefined) {
        await this.page
          .locator(HOUSEHOLD.itemByValue(dataValue))
          .click({ timeout: this.deps.timings.defaultTimeoutMs });
        this.deps.log.debug({ dropdown, label, dataValue }, "dropdown option selected");
        return;
      }
      await this.selectByText(label);
    } catch (error) {
      if (error instanceof ElementInteractionError) throw error;
      throw new ElementInteractionError(
        `Failed to select dropdown option ${label}: ${describeError(error)}`,
        error
      );
    }
  }

  private async selectByText(label: string): Promise<void> {
    const items = await this.interactor.findVisible([HOUSEHOLD.textItems]);
    const texts = await Promise.all(items.map((item) => item.textContent()));
    const index = pickOptionByText(texts, label);
    const match = items[index];
    if (match === undefined) {
      const available = texts.map((t) => (t ?? "").trim()).filter((t) => t.length > 0);
      this.deps.log.error({ label, available }, "no dropdown option matches");
      throw new ElementInteractionError(`Could not find dropdown option with text: ${label}`);
    }
    await match.click();
    this.deps.log.debug({ label, option: texts[index] }, "dropdown option selected by text");
  }

  private async fillGeneral(data: HouseholdData): Promise<void> {
    if (data.householdType) {
      await this.selectDropdownOption("householdType", data.householdType);
    }

    if (data.hasPets !== undefined) {
      await this.controls.selectYesNo("pets", data.hasPets);
      if (data.hasPets && data.petsType) {
        await this.interactor.fillField(HOUSEHOLD.petsType, data.petsType);
      }
    }

    if (data.hasMusicInstruments !== undefined) {
      await this.controls.selectYesNo("music_instruments", data.hasMusicInstruments);
      if (data.hasMusicInstruments && data.musicInstrumentsType) {
        await this.interactor.fillField(HOUSEHOLD.musicInstrumentsType, data.musicInstrumentsType);
      }
    }

    if (data.isSmoker !== undefined) {
      await this.controls.selectYesNo("smoking", data.isSmoker);
    }
  }

  private async fillMoving(data: HouseholdData): Promise<void> {
    if (data.relocationReason) {
      await this.selectDropdownOption("relocationReason", data.relocationReason);
    }
    if (data.desiredMoveDate) {
      await this.interactor.fillField(HOUSEHOLD.movingDate, data.desiredMoveDate);
    }
    if (data.mailboxLabel) {
      await this.interactor.fillField(HOUSEHOLD.mailboxLabel, data.mailboxLabel);
    }
  }

  private async fillSecurityDeposit(data: HouseholdData): Promise<void> {
    if (data.securityDepositType) {
      await this.controls.clickRadio(`securities_options-${data.securityDepositType}`);
    }
    if (data.incomeRentRatio !== undefined) {
      await this.controls.selectYesNo("income_rent_ratio", data.incomeRentRatio);
    }
    if (data.iban) await this.interactor.fillField(HOUSEHOLD.iban, data.iban);
    if (data.bankName) await this.interactor.fillField(HOUSEHOLD.bankName, data.bankName);
    if (data.accountOwner) {
      await this.interactor.fillField(HOUSEHOLD.accountOwner, data.accountOwner);
    }
  }

  private async fillMotivation(data: HouseholdData): Promise<void> {
    if (data.motivation) {
      await this.interactor.fillField(HOUSEHOLD.motivation, data.motivation);
    }
    if (data.participationIdeas) {
      await this.interactor.fillField(HOUSEHOLD.participation, data.participationIdeas);
    }
    if (data.relationToCooperative) {
      await this.selectDropdownOption("cooperativeRelation", data.relationToCooperative);
    }
    if (data.relationType) {
      await this.selectDropdownOption("relationType", data.relationType);
    }
  }

  private async fillAdditional(data: HouseholdData): Promise<void> {
    if (data.objectFoundOn) {
      await this.selectDropdownOption("objectSource", data.objectFoundOn);
    }
    if (data.remarks) {
      await this.interactor.fillField(HOUSEHOLD.remarks, data.remarks);
    }
  }
}
