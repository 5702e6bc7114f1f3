// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/summary-form`
 * Purpose: Page object for step 4 (summary): accepts the agreements and submits the application.
 * Scope: Summary detection, agreement checkboxes, final submit, a debug dump when the summary is missing.
 * Invariants: fillSummaryForm throws ApplicationFormError when the summary is missing or the submit button is absent.
 * Side-effects: IO (browser, screenshots)
 * Links: src/shared/config/selectors.ts (SUMMARY)
 * @public
 */

import type { Page } from "@playwright/test";

import {
  ApplicationFormError,
  describeError,
  FORM,
  STEPS,
  SUMMARY,
} from "@/shared";

import { ElementInteractor, FormControls, type PageDeps } from "./support";

export interface SummaryPageState {
  url: string;
  title: string;
  steps: string[];
  sections: number;
  checkboxIds: (string | null)[];
}

export class SummaryFormPage {
  private readonly interactor: ElementInteractor;
  private readonly controls: FormControls;

  constructor(
    private readonly page: Page,
    private readonly deps: PageDeps
  ) {
    this.interactor = new ElementInteractor(page, deps.log, deps.timings);
    this.controls = new FormControls(page, deps.log, deps.timings);
  }

  async verifySummaryPageLoaded(): Promise<boolean> {
    try {
      await this.page
        .locator(FORM.activeStep(STEPS.agreement))
        .waitFor({ state: "attached", timeout: this.deps.timings.defaultTimeoutMs });
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "summary step is not active");
      return false;
    }

    const indicator = await this.interactor.waitForAny(
      SUMMARY.indicators,
      this.deps.timings.defaultTimeoutMs
    );
    if (indicator === undefined) {
      this.deps.log.error("no summary indicators found");
      return false;
    }
    this.deps.log.info({ indicator }, "summary page verified");
    return true;
  }

  async debugCurrentPage(): Promise<SummaryPageState> {
    const state: SummaryPageState = {
      url: this.page.url(),
      title: await this.page.title(),
      steps: (await this.page.locator(".af-steps").allTextContents()).map((t) => t.trim()),
      sections: await this.page.locator(".section").count(),
      checkboxIds: await Promise.all(
        (await this.page.locator("input[type='checkbox']").all())
          .slice(0, 5)
          .map((box) => box.getAttribute("id"))
      ),
    };
    this.deps.log.info({ state }, "summary page state");
    await this.deps.screenshots.captureError(this.page, "summary_page_debug");
    return state;
  }

  async fillSummaryForm(): Promise<void> {
    try {
      if (!(await this.verifySummaryPageLoaded())) {
        await this.debugCurrentPage();
        throw new ApplicationFormError("Summary page did not load correctly");
      }

      for (const { id, description } of SUMMARY.agreements) {
        if (await this.controls.ensureChecked(id)) {
          this.deps.log.info({ agreement: description }, "agreement accepted");
        }
      }

      await this.submitApplication();
      await this.deps.screenshots.capture(this.page, "08_application_submitted", true);
      this.deps.log.info("application submitted");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "summary_form");
      throw new ApplicationFormError(
        `Error completing summary form: ${describeError(error)}`,
        error
      );
    }
  }

  private async submitApplication(): Promise<void> {
    await this.interactor.settle();
    const button = this.page.locator(SUMMARY.submitButton);
    if ((await button.count()) === 0) {
      throw new ApplicationFormError("Submit button not found");
    }
    await button.scrollIntoViewIfNeeded();
    await button.click();
    await this.interactor.settle();
  }
}
