// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/people-form`
 * Purpose: Page object for step 3 (people): adds each household member through the nested person form.
 * Scope: Add adult/child, fill adult or child fields, save each person, continue to the summary. Document uploads are skipped.
 * Invariants:
 * - The nested form is detected as a child form when the nights counter is present.
 * - Nights in the apartment are capped at 7.
 * - Dropdown and yes/no misses are logged, not thrown; missing save button throws.
 * Side-effects: IO (browser, screenshots)
 * Links: src/core/application/model.ts (PersonData), src/shared/config/selectors.ts (PEOPLE)
 * @public
 */

import type { Page } from "@playwright/test";

import type { PersonData } from "@/core";
import {
  ApplicationFormError,
  describeError,
  ElementInteractionError,
  FORM,
  PEOPLE,
  STEPS,
} from "@/shared";

import { ElementInteractor, FormControls, type PageDeps } from "./support";

const MAX_NIGHTS = 7;

/** Dropdowns whose input filters options as you type. */
const TYPEAHEAD_DROPDOWNS: readonly string[] = [
  PEOPLE.dropdowns.nationality,
  PEOPLE.dropdowns.country,
];

export class PeopleFormPage {
  private readonly interactor: ElementInteractor;
  private readonly controls: FormControls;

  constructor(
    private readonly page: Page,
    private readonly deps: PageDeps
  ) {
    this.interactor = new ElementInteractor(page, deps.log, deps.timings);
    this.controls = new FormControls(page, deps.log, deps.timings);
  }

  async verifyPeopleFormLoaded(): Promise<boolean> {
    try {
      const timeout = this.deps.timings.slowTimeoutMs;
      await this.page.locator(FORM.activeStep(STEPS.people)).waitFor({ state: "attached", timeout });
      await this.page.locator(PEOPLE.firstName).waitFor({ state: "attached", timeout });
      return true;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "could not verify people form");
      return false;
    }
  }

  async fillPeopleForm(people: readonly PersonData[]): Promise<void> {
    this.deps.log.info({ people: people.length }, "filling people step");
    try {
      for (const [index, person] of people.entries()) {
        if (person.kind === "child") {
          await this.addChild();
        } else {
          await this.addAdult();
        }
        if (index === 0 && !(await this.verifyPeopleFormLoaded())) {
          throw new ApplicationFormError("People form did not load correctly after adding a person");
        }
        await this.fillPerson(person, index);
        await this.saveCurrentPerson();
      }

      await this.navigateToSummary();
      await this.deps.screenshots.capture(this.page, "06_people_form_filled", true);
      this.deps.log.info("people step completed");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "people_form_filling");
      throw new ApplicationFormError(`Error filling people form: ${describeError(error)}`, error);
    }
  }

  async submitPeopleForm(): Promise<void> {
    try {
      const selector = await this.interactor.visibleSelector(PEOPLE.submitButtons);
      if (selector === undefined) {
        this.deps.log.warn("no submit button on people step");
        return;
      }
      if (!(await this.interactor.clickWithRetry(selector))) {
        throw new ElementInteractionError(`Could not click submit button ${selector}`);
      }
      this.deps.log.info("people step submitted");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "people_form_submission");
      throw new ApplicationFormError(`Error submitting people form: ${describeError(error)}`, error);
    }
  }

  private async addAdult(): Promise<void> {
    try {
      const button = this.page.locator(PEOPLE.addAdult);
      await button.waitFor({ state: "visible", timeout: this.deps.timings.defaultTimeoutMs });
      if (await button.isDisabled()) {
        this.deps.log.info("add adult button disabled, waiting");
        await this.interactor.settle();
      }
      await button.click();
      await this.page
        .locator(PEOPLE.firstName)
        .waitFor({ state: "visible", timeout: this.deps.timings.defaultTimeoutMs });
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "add_adult");
      throw new ApplicationFormError(`Could not add adult: ${describeError(error)}`, error);
    }
  }

  private async addChild(): Promise<void> {
    try {
      const button = await this.interactor.firstVisible(PEOPLE.addChild);
      if (button === undefined) {
        this.deps.log.info("no add child button, using add adult");
        await this.addAdult();
      } else {
        await button.scrollIntoViewIfNeeded();
        await button.click();
      }
      await this.page
        .locator(PEOPLE.childFormMarker)
        .first()
        .waitFor({ state: "attached", timeout: this.deps.timings.defaultTimeoutMs });
      await this.interactor.settle();
    } catch (error) {
      throw new ApplicationFormError(`Could not add child: ${describeError(error)}`, error);
    }
  }

  private async saveCurrentPerson(): Promise<void> {
    try {
      let button = this.page.locator(PEOPLE.saveButton);
      if ((await button.count()) === 0) {
        const fallback = await this.interactor.firstVisible(PEOPLE.saveFallbacks);
        if (fallback === undefined) {
          throw new ElementInteractionError("Save button for the person form not found");
        }
        button = fallback;
      }

      await button.scrollIntoViewIfNeeded();
      if (await button.isDisabled()) {
        this.deps.log.warn("save button disabled, waiting");
        await this.interactor.settle();
      }
      await button.click();

      try {
        await this.page
          .locator(PEOPLE.saveButton)
          .waitFor({ state: "hidden", timeout: this.deps.timings.slowTimeoutMs });
        this.deps.log.info("person saved");
      } catch {
        this.deps.log.info("person form still open after save");
        await this.interactor.settle();
      }
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "save_person");
      throw new ApplicationFormError(`Could not save person data: ${describeError(error)}`, error);
    }
  }

  private async fillPerson(person: PersonData, index: number): Promise<void> {
    const isChildForm = (await this.page.locator(`#${PEOPLE.nightsPresent}`).count()) > 0;
    this.deps.log.info({ person: index + 1, childForm: isChildForm }, "filling person");
    if (isChildForm) {
      await this.fillChild(person);
    } else {
      await this.fillAdult(person);
    }
  }

  private async fillChild(person: PersonData): Promise<void> {
    await this.interactor.fillField(PEOPLE.firstName, person.firstName);
    await this.interactor.fillField(PEOPLE.lastName, person.lastName);
    if (person.dateOfBirth) await this.interactor.fillField(PEOPLE.dateOfBirth, person.dateOfBirth);
    if (person.nationality) await this.selectDropdown(PEOPLE.dropdowns.nationality, person.nationality);

    const nights = Math.max(0, Math.min(person.nightsInApartment ?? MAX_NIGHTS, MAX_NIGHTS));
    await this.controls.stepTo(PEOPLE.nightsPresent, nights);
  }

  private async fillAdult(person: PersonData): Promise<void> {
    await this.fillGeneral(person);
    await this.fillContact(person);
    await this.fillHousing(person);
    if (person.employmentStatus) {
      await this.selectDropdown(PEOPLE.dropdowns.employment, person.employmentStatus);
    }
    await this.fillCreditworthiness(person);
    this.deps.log.info("document uploads skipped");
    if (await this.controls.ensureChecked(PEOPLE.agreementReferences)) {
      this.deps.log.debug("references agreement checked");
    }
  }

  private async fillGeneral(person: PersonData): Promise<void> {
    await this.interactor.settle();
    if (person.salutation) await this.selectDropdown(PEOPLE.dropdowns.salutation, person.salutation);
    await this.interactor.fillField(PEOPLE.firstName, person.firstName);
    await this.interactor.fillField(PEOPLE.lastName, person.lastName);
    if (person.dateOfBirth) await this.interactor.fillField(PEOPLE.dateOfBirth, person.dateOfBirth);
    if (person.placeOfBirth) await this.interactor.fillField(PEOPLE.placeOfBirth, person.placeOfBirth);
    if (person.civilStatus) await this.selectDropdown(PEOPLE.dropdowns.civilStatus, person.civilStatus);

    if (person.nationality) {
      await this.selectDropdown(PEOPLE.dropdowns.nationality, person.nationality);
      await this.interactor.fillField(
        PEOPLE.placeOfCitizenship,
        person.placeOfBirth ?? person.nationality
      );
    } else {
      this.deps.log.warn("no nationality, skipping hometown");
    }

    if (person.residencyStatus) {
      await this.selectDropdown(PEOPLE.dropdowns.residencyStatus, person.residencyStatus);
    }
    if (person.livingInCountrySince) {
      await this.interactor.fillField(PEOPLE.livingInCountrySince, person.livingInCountrySince);
    }
    if (person.typeOfTenant) await this.selectDropdown(PEOPLE.dropdowns.tenantType, person.typeOfTenant);
  }

  private async fillContact(person: PersonData): Promise<void> {
    if (person.phoneNumber) await this.interactor.fillField(PEOPLE.phone, person.phoneNumber);
    if (person.businessPhone) await this.interactor.fillField(PEOPLE.officePhone, person.businessPhone);
    if (person.email) {
      await this.interactor.fillField(PEOPLE.email, person.email);
      await this.interactor.fillField(PEOPLE.emailConfirm, person.email);
    }
  }

  private async fillHousing(person: PersonData): Promise<void> {
    if (person.streetAndNumber) await this.interactor.fillField(PEOPLE.street, person.streetAndNumber);
    if (person.postCode) await this.interactor.fillField(PEOPLE.postcode, person.postCode);
    if (person.city) await this.interactor.fillField(PEOPLE.city, person.city);
    if (person.country) await this.selectDropdown(PEOPLE.dropdowns.country, person.country);
    if (person.moveInDate) await this.interactor.fillField(PEOPLE.livingSince, person.moveInDate);

    await this.answerYesNo("legal_residence", person.civilLawResidence);
    await this.answerYesNo("move_three_years", person.relocationLast3Years);
    await this.answerYesNo("member", person.communityMember);
  }

  private async fillCreditworthiness(person: PersonData): Promise<void> {
    if (person.creditCheckType === "Excerpt from debt collection") {
      await this.page.locator(PEOPLE.creditEnforcement).click();
    } else if ((await this.page.locator(`${PEOPLE.creditCertificate}.selected`).count()) === 0) {
      await this.page.locator(PEOPLE.creditCertificate).click();
    }

    await this.answerYesNo("liability", person.personalLiabilityInsurance);
    await this.answerYesNo("household_insurance", person.householdInsurance);
  }

  private async answerYesNo(questionId: string, value: boolean | undefined): Promise<void> {
    if (value === undefined) return;
    try {
      const button = this.page.locator(PEOPLE.yesNo(questionId, value));
      if ((await button.count()) > 0) await button.click();
    } catch (error) {
      this.deps.log.warn({ questionId, reason: describeError(error) }, "could not answer question");
    }
  }

  private async selectDropdown(fieldId: string, value: string): Promise<void> {
    try {
      let toggle = this.page.locator(FORM.dropdownToggle(fieldId));
      if ((await toggle.count()) === 0) toggle = this.page.locator(`#${fieldId}`);
      if ((await toggle.count()) === 0) {
        this.deps.log.warn({ fieldId }, "dropdown not found");
        return;
      }

      await toggle.scrollIntoViewIfNeeded();
      await toggle.click();
      await this.interactor.settle();
      if (TYPEAHEAD_DROPDOWNS.includes(fieldId)) {
        await this.page.locator(`input#${fieldId}`).fill(value);
      }

      const option = await this.interactor.firstVisible(PEOPLE.dropdownOption(value));
      if (option === undefined) {
        this.deps.log.warn({ fieldId, value }, "dropdown option not found");
        return;
      }
      await option.scrollIntoViewIfNeeded();
      await option.click();
      this.deps.log.debug({ fieldId, value }, "dropdown option selected");
    } catch (error) {
      this.deps.log.warn({ fieldId, value, reason: describeError(error) }, "could not select dropdown option");
      await this.deps.screenshots.captureError(this.page, `dropdown_${fieldId}`);
    }
  }

  private async navigateToSummary(): Promise<void> {
    const selector = await this.interactor.visibleSelector(PEOPLE.continueButtons);
    if (selector === undefined) {
      this.deps.log.warn("no continue button, summary may load by itself");
      await this.interactor.settle();
      return;
    }
    if (!(await this.interactor.clickWithRetry(selector))) {
      throw new ElementInteractionError(`Could not click continue button ${selector}`);
    }
  }
}
