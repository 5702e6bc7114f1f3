// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/admin/verification`
 * Purpose: Compare what the admin panel shows against the applicant data that was submitted.
 * Scope: Table-row checks, detail-view checks, pass counting and human-readable summary lines. Does not query the DOM.
 * Invariants:
 * - The first person in the family is the main applicant; the rest are household members.
 * - A check is true only when the expected value is non-empty and present.
 * Side-effects: none
 * Links: src/core/admin/model.ts, src/flows/admin-verification.flow.ts
 * @public
 */

import type { PersonData } from "@/core/application/model";

import { nameVariants, stripPhone } from "./matching";
import type {
  ApplicantVerification,
  DetailChecks,
  DetailData,
  TableChecks,
  TableRowData,
} from "./model";

function includesLower(haystack: string, needle: string | undefined): boolean {
  return needle !== undefined && needle.length > 0 && haystack.includes(needle.toLowerCase());
}

export function emptyVerification(): ApplicantVerification {
  return {
    foundInTable: false,
    rowClicked: false,
    detailPageLoaded: false,
    errors: [],
  };
}

export function verifyTableData(
  row: TableRowData,
  main: PersonData,
  family: readonly PersonData[]
): TableChecks {
  const text = row.fullRowText.toLowerCase();
  const others = family.slice(1);
  return {
    nameFound: nameVariants(main).some((variant) => text.includes(variant)),
    emailFound: includesLower(text, main.email),
    dateFound: includesLower(text, main.moveInDate),
    additionalDataFound: others.some(
      (p) => includesLower(text, p.firstName) || includesLower(text, p.lastName)
    ),
  };
}

export function verifyDetailedData(
  detail: DetailData,
  main: PersonData,
  family: readonly PersonData[]
): DetailChecks {
  const text = detail.fullPageText.toLowerCase();
  const emails = detail.emailsFound.map((e) => e.toLowerCase());
  const phone = main.phoneNumber ? stripPhone(main.phoneNumber) : "";

  return {
    emailFoundInDetail: main.email.length > 0 && emails.includes(main.email.toLowerCase()),
    phoneFoundInDetail:
      phone.length > 0 && detail.phonesFound.some((found) => stripPhone(found).includes(phone)),
    addressFoundInDetail:
      includesLower(text, main.streetAndNumber) && includesLower(text, main.city),
    moveInDateFoundInDetail:
      main.moveInDate !== undefined && detail.datesFound.includes(main.moveInDate),
    additionalDetailsVerified: family
      .slice(1)
      .some((p) => includesLower(text, p.firstName) && includesLower(text, p.lastName)),
  };
}

export function countPassed(checks: TableChecks | DetailChecks): {
  passed: number;
  total: number;
} {
  const values = Object.values(checks);
  return { passed: values.filter(Boolean).length, total: values.length };
}

/** Ordered report lines for the end of an admin verification run. */
export function summarizeVerification(result: ApplicantVerification): string[] {
  if (!result.foundInTable) {
    return ["applicant not found in table", ...result.errors];
  }

  const lines = ["applicant found in table"];
  if (result.tableChecks) {
    const { passed, total } = countPassed(result.tableChecks);
    lines.push(`table checks passed: ${passed}/${total}`);
  }
  if (!result.rowClicked) {
    lines.push("row could not be clicked");
  } else if (!result.detailPageLoaded) {
    lines.push("row clicked but detail view did not load");
  } else if (result.detailChecks) {
    const { passed, total } = countPassed(result.detailChecks);
    lines.push(`detail checks passed: ${passed}/${total}`);
  }
  return [...lines, ...result.errors];
}
