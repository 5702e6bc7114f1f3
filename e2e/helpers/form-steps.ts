// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/helpers/form-steps`
 * Purpose: Walk the fixture application form up to a given step so each spec starts where it tests.
 * Scope: Uses the page objects with minimal answers. Does not assert.
 * Invariants: Each helper returns the form page, positioned at the start of the named step.
 * Side-effects: IO (browser)
 * Links: e2e/fixtures/application-form.html
 * @internal
 */

import type { Page } from "@playwright/test";

import { emptyRequirements, type PersonData } from "@/core";
import {
  ApplicationFormPage,
  HouseholdFormPage,
  type PageDeps,
  PeopleFormPage,
} from "@/pages";

import type { FixtureSite } from "./fixtures";
import { MUSTER_FAMILY } from "./applicants";

export function fixtureForm(page: Page, deps: PageDeps, site: FixtureSite): ApplicationFormPage {
  return new ApplicationFormPage(page, deps, {
    applicationFormUrl: site.url("/form"),
    fallbackApplicationUrl: site.url("/form"),
  });
}

export async function openRequirementsStep(
  page: Page,
  deps: PageDeps,
  site: FixtureSite
): Promise<ApplicationFormPage> {
  const form = fixtureForm(page, deps, site);
  await form.navigateDirect();
  return form;
}

export async function openHouseholdStep(
  page: Page,
  deps: PageDeps,
  site: FixtureSite
): Promise<Page> {
  const form = await openRequirementsStep(page, deps, site);
  await form.fillForm(emptyRequirements());
  await form.submitForm();
  return form.currentPage;
}

export async function openPeopleStep(page: Page, deps: PageDeps, site: FixtureSite): Promise<Page> {
  const formPage = await openHouseholdStep(page, deps, site);
  const household = new HouseholdFormPage(formPage, deps);
  await household.fillHouseholdForm({ householdType: "single person household" });
  await household.submitHouseholdForm();
  return formPage;
}

export async function openSummaryStep(
  page: Page,
  deps: PageDeps,
  site: FixtureSite,
  people: readonly PersonData[] = MUSTER_FAMILY
): Promise<Page> {
  const formPage = await openPeopleStep(page, deps, site);
  await new PeopleFormPage(formPage, deps).fillPeopleForm(people);
  return formPage;
}
