// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@flows/admin-verification`
 * Purpose: Checks a submitted family in the admin panel.
 * Scope: login → applications page → table summary → applicant row and detail view. Logs the verification summary.
 * Invariants:
 * - Login and navigation failures throw; applicant lookup failures are reported in the returned verification.
 * - Without credentials the page is taken as already signed in and the login phase is skipped.
 * Side-effects: IO (browser, screenshots)
 * Links: src/pages/admin-login.page.ts, src/pages/admin-applications.page.ts
 * @public
 */

import type { Page } from "@playwright/test";

import {
  type ApplicantVerification,
  fullName,
  type PersonData,
  type RunResult,
  summarizeVerification,
  type TableSummary,
} from "@/core";
import {
  type AdminCredentials,
  AdminApplicationsPage,
  AdminLoginPage,
  type PageDeps,
} from "@/pages";
import { logPhase } from "@/shared";

export interface AdminVerificationOptions {
  adminUrl: string;
  /** Omit to reuse a page that already holds an admin session. */
  credentials?: AdminCredentials;
  family: readonly PersonData[];
  /** Defaults to `/applications` on the admin host. */
  applicationsUrl?: string;
}

export interface AdminVerificationResult {
  table: TableSummary;
  verification: ApplicantVerification;
}

export type AdminVerificationPhase =
  | "admin login"
  | "applications page"
  | "applications table"
  | "applicant verification";

export function applicationsUrlFor(adminUrl: string): string {
  return new URL("/applications", adminUrl).toString();
}

export function adminVerificationPhases(
  options: Pick<AdminVerificationOptions, "credentials">
): AdminVerificationPhase[] {
  const phases: AdminVerificationPhase[] = [
    "applications page",
    "applications table",
    "applicant verification",
  ];
  return options.credentials === undefined ? phases : ["admin login", ...phases];
}

/** Only a submitted application can be looked up in the admin panel. */
export function readyForAdminCheck(result: RunResult): boolean {
  return result.success && result.status === "submitted";
}

export async function runAdminVerification(
  page: Page,
  deps: PageDeps,
  options: AdminVerificationOptions
): Promise<AdminVerificationResult> {
  const { log } = deps;
  const [main] = options.family;
  const applicant = main === undefined ? "unknown" : fullName(main);

  const applications = new AdminApplicationsPage(
    page,
    deps,
    options.applicationsUrl ?? applicationsUrlFor(options.adminUrl)
  );

  const { credentials } = options;
  log.info({ applicant, phases: adminVerificationPhases(options) }, "admin verification");
  if (credentials !== undefined) {
    const login = new AdminLoginPage(page, deps, options.adminUrl, credentials);
    await logPhase(
      log,
      "admin login",
      async () => {
        await login.navigateToAdminLogin();
        await login.loginToAdminPanel();
      },
      { applicant }
    );
  } else {
    log.info({ applicant }, "reusing admin session");
  }

  await logPhase(log, "applications page", () => applications.navigateToApplications());

  const table = await logPhase(log, "applications table", () => applications.getTableSummary());
  log.info(
    { total: table.totalApplications, headers: table.headers, samples: table.sampleRows.slice(0, 3) },
    "applications table"
  );
  for (const error of table.errors) log.error({ error }, "table analysis error");

  const verification = await logPhase(
    log,
    "applicant verification",
    () => applications.openApplicantDetails(options.family),
    { applicant, email: main?.email }
  );
  for (const line of summarizeVerification(verification)) {
    log.info(line);
  }
  return { table, verification };
}
