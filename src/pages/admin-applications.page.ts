// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/admin-applications`
 * Purpose: Page object for the admin applications list and an applicant's detail view.
 * Scope: Reaches the applications page, summarizes the table, finds the applicant's row, opens it and extracts the detail data.
 *   Matching and scoring live in @/core (admin).
 * Invariants:
 * - verifyApplicantInTable and openApplicantDetails never throw; failures land in `errors`.
 * - Row search tries the exact texts of applicantRowTexts in order before scanning every row.
 * Side-effects: IO (browser, screenshots)
 * Links: src/core/admin/verification.ts, src/core/admin/extraction.ts
 * @public
 */

import type { Locator, Page } from "@playwright/test";

import {
  type ApplicantVerification,
  applicantRowTexts,
  countPassed,
  type DetailData,
  emptyVerification,
  extractDetailData,
  fieldKey,
  findEmails,
  identifyRowData,
  type PersonData,
  rowMatchesApplicant,
  summarizeTable,
  type TableRowData,
  type TableSummary,
  verifyDetailedData,
  verifyTableData,
} from "@/core";
import { ADMIN, ApplicationFormError, describeError } from "@/shared";

import { ElementInteractor, type PageDeps } from "./support";

const MIN_DETAIL_ELEMENTS = 5;

export class AdminApplicationsPage {
  private readonly interactor: ElementInteractor;

  constructor(
    private readonly page: Page,
    private readonly deps: PageDeps,
    private readonly applicationsUrl: string
  ) {
    this.interactor = new ElementInteractor(page, deps.log, deps.timings);
  }

  async navigateToApplications(): Promise<void> {
    try {
      await this.tryNavigationMenu();
      if (!this.page.url().includes("/applications")) {
        this.deps.log.info({ url: this.applicationsUrl }, "menu navigation failed, opening url");
        await this.page.goto(this.applicationsUrl);
      }
      await this.page.waitForLoadState("domcontentloaded", {
        timeout: this.deps.timings.networkIdleTimeoutMs,
      });
      await this.interactor.settle();
      await this.deps.screenshots.capture(this.page, "11_applications_page", true);

      if (!(await this.verifyApplicationsPageLoaded())) {
        throw new ApplicationFormError("Applications page did not load correctly");
      }
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "applications_navigation");
      throw new ApplicationFormError(
        `Error navigating to applications page: ${describeError(error)}`,
        error
      );
    }
  }

  async getTableSummary(): Promise<TableSummary> {
    try {
      await this.waitForApplicationsTable();
      const summary = summarizeTable(
        await this.page.locator(ADMIN.headers).allTextContents(),
        await this.page.locator(ADMIN.bodyRows).allTextContents()
      );
      this.deps.log.info({ total: summary.totalApplications }, "applications table summary");
      return summary;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "could not summarize table");
      return {
        totalApplications: 0,
        headers: [],
        sampleRows: [],
        errors: [`Error getting table summary: ${describeError(error)}`],
      };
    }
  }

  async verifyApplicantInTable(family: readonly PersonData[]): Promise<ApplicantVerification> {
    const result = emptyVerification();
    const [main] = family;
    if (main === undefined) {
      result.errors.push("No main applicant data provided for verification");
      return result;
    }

    try {
      await this.waitForApplicationsTable();
      const row = await this.findApplicantRow(main);
      if (row === undefined) {
        result.errors.push("Applicant not found in applications table");
        await this.debugTableContents();
        await this.deps.screenshots.captureError(this.page, "applicant_not_found_in_table");
        return result;
      }

      result.foundInTable = true;
      result.tableRow = await this.extractRowData(row);
      result.tableChecks = verifyTableData(result.tableRow, main, family);
      this.deps.log.info(countPassed(result.tableChecks), "table checks");
      await this.deps.screenshots.capture(this.page, "12_applicant_verified_in_table", true);
    } catch (error) {
      result.errors.push(`Error during verification: ${describeError(error)}`);
      await this.deps.screenshots.captureError(this.page, "applicant_verification");
    }
    return result;
  }

  async openApplicantDetails(family: readonly PersonData[]): Promise<ApplicantVerification> {
    const result = await this.verifyApplicantInTable(family);
    const [main] = family;
    if (!result.foundInTable || main === undefined) {
      result.errors.push("Cannot click row - applicant not found in table");
      return result;
    }

    try {
      const row = await this.findApplicantRow(main);
      if (row === undefined) {
        result.errors.push("Applicant row disappeared before it could be clicked");
        return result;
      }
      await this.clickRow(row);
      result.rowClicked = true;

      result.detailPageLoaded = await this.waitForDetailView();
      if (!result.detailPageLoaded) {
        result.errors.push("Detail view did not load after clicking row");
        return result;
      }

      result.detail = await this.extractDetailPageData();
      result.detailChecks = verifyDetailedData(result.detail, main, family);
      this.deps.log.info(countPassed(result.detailChecks), "detail checks");
      await this.deps.screenshots.capture(this.page, "13_applicant_detail_view", true);
    } catch (error) {
      result.errors.push(`Error during detailed verification: ${describeError(error)}`);
      await this.deps.screenshots.captureError(this.page, "detailed_verification");
    }
    return result;
  }

  private async tryNavigationMenu(): Promise<void> {
    const link = await this.interactor.waitForVisible(
      ADMIN.navigation,
      this.deps.timings.defaultTimeoutMs
    );
    if (link !== undefined) {
      await link.click();
      await this.interactor.settle();
      if (this.page.url().includes("/applications")) return;
      this.deps.log.info({ url: this.page.url() }, "menu click left url unchanged");
    }

    const clicked = await this.page.evaluate(() => {
      const byHref = document.querySelector<HTMLElement>('a[href="/applications"]');
      if (byHref) {
        byHref.click();
        return true;
      }
      for (const el of Array.from(document.querySelectorAll("*"))) {
        if (el.textContent?.trim() !== "Applications") continue;
        const clickable = el.closest<HTMLElement>("a, button, [onclick]");
        if (clickable) {
          clickable.click();
          return true;
        }
      }
      return false;
    });
    if (clicked) await this.interactor.settle();
  }

  private async verifyApplicationsPageLoaded(): Promise<boolean> {
    const url = this.page.url();
    if (url.includes("/applications") || url.includes("/bewerbungen")) return true;

    const indicator = await this.interactor.waitForVisible(
      ADMIN.applicationsPageIndicators,
      this.deps.timings.defaultTimeoutMs
    );
    if (indicator !== undefined) return true;

    this.deps.log.error({ url, title: await this.page.title() }, "applications page indicators not found");
    await this.deps.screenshots.captureError(this.page, "applications_page_debug");
    return false;
  }

  private async waitForApplicationsTable(): Promise<void> {
    const table =
      (await this.interactor.waitForVisible(ADMIN.tables, this.deps.timings.slowTimeoutMs)) ??
      (await this.interactor.waitForVisible(ADMIN.tableContent, this.deps.timings.defaultTimeoutMs));
    if (table === undefined) {
      this.deps.log.warn("no applications table found");
    }
    await this.interactor.settle();
  }

  private async findApplicantRow(main: PersonData): Promise<Locator | undefined> {
    for (const text of applicantRowTexts(main)) {
      const rows = this.page.locator(ADMIN.allRows, { hasText: text });
      if ((await rows.count()) > 0) {
        this.deps.log.info({ text }, "applicant row found");
        const row = rows.first();
        await this.highlightRow(row);
        return row;
      }
    }

    for (const row of await this.page.locator(ADMIN.allRows).all()) {
      if (rowMatchesApplicant(await row.textContent(), main)) {
        await this.highlightRow(row);
        return row;
      }
    }
    this.deps.log.warn("no row matches the applicant");
    return undefined;
  }

  private async highlightRow(row: Locator): Promise<void> {
    try {
      await row.evaluate((el) => {
        el.style.border = "3px solid red";
        el.style.backgroundColor = "#ffebee";
        el.scrollIntoView({ block: "center" });
      });
      await this.interactor.settle(this.deps.timings.highlightMs);
    } catch (error) {
      this.deps.log.warn({ reason: describeError(error) }, "could not highlight row");
    }
  }

  private async extractRowData(row: Locator): Promise<TableRowData> {
    const data = identifyRowData(
      (await row.textContent()) ?? "",
      await row.locator(ADMIN.rowCells).allTextContents()
    );
    this.deps.log.debug({ row: data }, "row data");
    return data;
  }

  private async clickRow(row: Locator): Promise<void> {
    const timeout = this.deps.timings.defaultTimeoutMs;
    const strategies: { name: string; run: () => Promise<void> }[] = [
      { name: "row", run: () => row.click({ timeout }) },
      {
        name: "first cell",
        run: async () => {
          const cell = row.locator("td").first();
          const action = cell.locator("a, button, [onclick]").first();
          await ((await action.count()) > 0 ? action : cell).click({ timeout });
        },
      },
      {
        name: "row action",
        run: async () => {
          const action = await this.interactor.firstVisible(ADMIN.rowActions, row);
          await (action ?? row).click({ timeout });
        },
      },
      { name: "double click", run: () => row.dblclick({ timeout }) },
    ];

    for (const { name, run } of strategies) {
      try {
        await run();
        this.deps.log.info({ strategy: name }, "row clicked");
        await this.interactor.settle();
        return;
      } catch (error) {
        this.deps.log.debug({ strategy: name, reason: describeError(error) }, "row click failed");
      }
    }
    throw new ApplicationFormError("Could not click table row");
  }

  private async waitForDetailView(): Promise<boolean> {
    const indicator = await this.interactor.waitForVisible(
      ADMIN.detailIndicators,
      this.deps.timings.defaultTimeoutMs
    );
    if (indicator !== undefined) return true;

    const url = this.page.url();
    if (url.includes("/detail") || url.includes("/application/")) return true;

    let found = 0;
    for (const selector of ADMIN.detailContent) {
      found += await this.page.locator(selector).count();
    }
    if (found > MIN_DETAIL_ELEMENTS) return true;

    this.deps.log.warn("detail view may not have loaded");
    return false;
  }

  private async extractDetailPageData(): Promise<DetailData> {
    const fields: Record<string, string> = {};
    for (const selector of ADMIN.detailFields) {
      for (const [index, field] of (await this.page.locator(selector).all()).entries()) {
        try {
          const value = (await field.inputValue()).trim();
          if (!value) continue;
          const name = (await field.getAttribute("name")) || (await field.getAttribute("id"));
          fields[fieldKey(selector, name, index)] = value;
        } catch (error) {
          this.deps.log.debug({ selector, index, reason: describeError(error) }, "field unreadable");
        }
      }
    }

    const detail = extractDetailData((await this.page.locator("body").textContent()) ?? "", fields);
    this.deps.log.info({ fields: Object.keys(fields).length }, "detail data extracted");
    return detail;
  }

  private async debugTableContents(): Promise<void> {
    const rows = await this.page.locator(ADMIN.allRows).allTextContents();
    const bodyText = (await this.page.locator("body").textContent()) ?? "";
    this.deps.log.info(
      {
        rowCount: rows.length,
        rows: rows.slice(0, 10).map((r) => r.trim().slice(0, 150)),
        emails: findEmails(bodyText).slice(0, 5),
      },
      "applications table contents"
    );
  }
}
