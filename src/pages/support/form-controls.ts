// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/support/form-controls`
 * Purpose: The application form's custom widgets: `li` radios, +/- counters, checkboxes and the step submit button.
 * Scope: Widget-level interaction shared by all four form steps. Does not know which fields a step has.
 * Invariants:
 * - clickRadio and the counter setters throw ElementInteractionError on failure.
 * - ensureChecked and hasValidationErrors never throw.
 * Side-effects: IO (browser), time
 * Links: src/shared/config/selectors.ts (FORM)
 * @public
 */

import type { Page } from "@playwright/test";

import {
  describeError,
  ElementInteractionError,
  FORM,
  type Logger,
  type SuiteTimings,
} from "@/shared";

import { ElementInteractor } from "./element-interactor";

export class FormControls {
  private readonly interactor: ElementInteractor;

  constructor(
    private readonly page: Page,
    private readonly log: Logger,
    private readonly timings: SuiteTimings
  ) {
    this.interactor = new ElementInteractor(page, log, timings);
  }

  async clickRadio(optionId: string): Promise<void> {
    try {
      const radio = this.page.locator(FORM.radio(optionId));
      await radio.waitFor({ state: "visible", timeout: this.timings.defaultTimeoutMs });
      await radio.click();
      this.log.debug({ optionId }, "radio clicked");
    } catch (error) {
      throw new ElementInteractionError(
        `Failed to click radio option ${optionId}: ${describeError(error)}`,
        error
      );
    }
  }

  async selectYesNo(field: string, yes: boolean): Promise<void> {
    await this.clickRadio(`${field}-${yes ? "true" : "false"}`);
  }

  /** Resets the counter to 0 and clicks increment `value` times, typing the value if a click fails. */
  async incrementFromZero(fieldId: string, value: number): Promise<void> {
    const input = this.page.locator(FORM.counterInput(fieldId));
    try {
      await input.waitFor({ state: "visible", timeout: this.timings.defaultTimeoutMs });
      await input.fill("0");
      const increment = this.page.locator(FORM.counterIncrement(fieldId));
      for (let i = 0; i < value; i++) {
        try {
          await increment.click({ timeout: this.timings.defaultTimeoutMs });
        } catch {
          this.log.debug({ fieldId }, "increment failed, typing value");
          await input.fill(String(value));
          break;
        }
      }
      this.log.debug({ fieldId, value }, "counter set");
    } catch (error) {
      throw new ElementInteractionError(
        `Failed to set number field ${fieldId}: ${describeError(error)}`,
        error
      );
    }
  }

  /** Steps the counter from its current value to `value` with the +/- buttons. */
  async stepTo(fieldId: string, value: number): Promise<number> {
    try {
      const input = this.page.locator(FORM.counterInput(fieldId));
      const current = Number.parseInt(await input.inputValue(), 10);
      const difference = value - (Number.isNaN(current) ? 0 : current);
      const button = this.page.locator(
        difference > 0 ? FORM.counterIncrement(fieldId) : FORM.counterDecrement(fieldId)
      );
      for (let i = 0; i < Math.abs(difference); i++) {
        await button.click();
      }

      const final = Number.parseInt(await input.inputValue(), 10);
      if (final !== value) {
        this.log.warn({ fieldId, expected: value, actual: final }, "counter did not reach value");
      }
      return final;
    } catch (error) {
      throw new ElementInteractionError(
        `Could not set number incrementer ${fieldId}: ${describeError(error)}`,
        error
      );
    }
  }

  /** Checks `#id`, or clicks its label when the input itself is absent. */
  async ensureChecked(id: string): Promise<boolean> {
    try {
      const checkbox = this.page.locator(`#${id}`);
      if ((await checkbox.count()) > 0) {
        if (!(await checkbox.isChecked())) await checkbox.click();
        return true;
      }
      const label = this.page.locator(`label[for='${id}']`);
      if ((await label.count()) > 0) {
        await label.click();
        return true;
      }
      this.log.warn({ id }, "checkbox not found");
      return false;
    } catch (error) {
      this.log.warn({ id, reason: describeError(error) }, "could not check checkbox");
      return false;
    }
  }

  async hasValidationErrors(): Promise<boolean> {
    const errors = await this.interactor.findVisible(FORM.errorMessages);
    const [first] = errors;
    if (first === undefined) return false;
    this.log.error({ message: await first.textContent() }, "validation error");
    return true;
  }

  async isStepActive(stepId: string): Promise<boolean> {
    return (await this.page.locator(FORM.activeStep(stepId)).count()) > 0;
  }

  /** Scrolls to, outlines and clicks the step's save-and-next button. */
  async clickSubmit(waitTimeoutMs: number = this.timings.defaultTimeoutMs): Promise<void> {
    const button = this.page.locator(FORM.submitButton);
    await button.waitFor({ state: "visible", timeout: waitTimeoutMs });
    await button.scrollIntoViewIfNeeded();
    await this.interactor.highlight(button);
    await button.click();
    await this.interactor.settle();
  }
}
