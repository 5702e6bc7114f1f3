// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/pages/people-form`
 * Purpose: People step page object against the local form fixture.
 * Scope: Adding adults and children through nested forms, saving them, continuing to the summary.
 * Invariants: No request leaves the fixture hosts.
 * Side-effects: IO (browser, screenshots)
 * Links: src/pages/people-form.page.ts, e2e/fixtures/application-form.html
 * @internal
 */

import { PeopleFormPage } from "@/pages";

import { ANNA, LENA } from "../../helpers/applicants";
import { expect, test } from "../../helpers/fixtures";
import { openPeopleStep } from "../../helpers/form-steps";

test.describe("People step", () => {
  test("saves an adult and a child and continues to the summary", async ({
    page,
    deps,
    fixtureSite,
  }) => {
    const formPage = await openPeopleStep(page, deps, fixtureSite);

    await new PeopleFormPage(formPage, deps).fillPeopleForm([ANNA, LENA]);

    await expect(formPage.locator("#people-list li")).toHaveText(["Anna Muster", "Lena Muster"]);
    await expect(formPage.locator("#people-list li[data-kind='child']")).toHaveText("Lena Muster");
    await expect(formPage.locator("#apartment_agreement .af-position")).toHaveClass(/active/);
    await expect(formPage.locator("#summary-people li")).toHaveText(["Anna Muster", "Lena Muster"]);
  });

  test("never steps the nights counter below zero", async ({ page, deps, fixtureSite }) => {
    const formPage = await openPeopleStep(page, deps, fixtureSite);
    await formPage.evaluate(() => {
      document.addEventListener("click", (event) => {
        if (event.target instanceof Element && event.target.id === "decrement-field-days_present") {
          document.body.dataset.decrements = String(Number(document.body.dataset.decrements ?? "0") + 1);
        }
      });
    });

    await new PeopleFormPage(formPage, deps).fillPeopleForm([ANNA, { ...LENA, nightsInApartment: -3 }]);

    await expect(formPage.locator("#people-list li")).toHaveText(["Anna Muster", "Lena Muster"]);
    expect(await formPage.locator("body").getAttribute("data-decrements")).toBeNull();
  });

  test("fails the step when the continue button never takes a click", async ({
    page,
    deps,
    fixtureSite,
  }) => {
    const formPage = await openPeopleStep(page, deps, fixtureSite);
    await formPage.evaluate(() => {
      document.getElementById("application-btn-next")?.setAttribute("disabled", "");
    });
    const people = new PeopleFormPage(formPage, {
      ...deps,
      timings: { ...deps.timings, defaultTimeoutMs: 300 },
    });

    await expect(people.fillPeopleForm([ANNA])).rejects.toThrow(
      /^Error filling people form: Could not click continue button #application-btn-next/
    );
  });

  test("submits the step through its continue button", async ({ page, deps, fixtureSite }) => {
    const formPage = await openPeopleStep(page, deps, fixtureSite);
    await formPage.evaluate(() => {
      const item = document.createElement("li");
      item.textContent = "Anna Muster";
      document.getElementById("people-list")?.append(item);
    });

    await new PeopleFormPage(formPage, deps).submitPeopleForm();

    await expect(formPage.locator("#apartment_agreement .af-position")).toHaveClass(/active/);
    await expect(formPage.locator("#summary-people li")).toHaveText(["Anna Muster"]);
  });

  test("reports loaded only once a person form is open", async ({ page, deps, fixtureSite }) => {
    const formPage = await openPeopleStep(page, deps, fixtureSite);
    const people = new PeopleFormPage(formPage, deps);

    expect(await people.verifyPeopleFormLoaded()).toBe(false);
    await formPage.locator("#create-new-adult").click();
    expect(await people.verifyPeopleFormLoaded()).toBe(true);
  });

  test("wraps a failed save in an application form error", async ({
    page,
    deps,
    fixtureSite,
  }) => {
    const formPage = await openPeopleStep(page, deps, fixtureSite);
    await formPage.evaluate(() => {
      document.getElementById("adult-template")?.remove();
    });

    await expect(new PeopleFormPage(formPage, deps).fillPeopleForm([ANNA])).rejects.toThrow(
      /^Error filling people form: Could not add adult/
    );
  });
});
