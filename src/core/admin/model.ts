// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/admin/model`
 * Purpose: Shapes of what the admin panel shows about submitted applications, and of the checks run against it.
 * Scope: Pure domain types. Does not handle I/O.
 * Invariants: Check records are all-boolean so they can be counted uniformly.
 * Side-effects: none
 * Links: src/core/admin/verification.ts, src/pages/admin-applications.page.ts
 * @public
 */

export interface TableRowData {
  fullRowText: string;
  /** Non-empty trimmed cell texts in column order. */
  cells: string[];
  email?: string;
  datesFound: string[];
  statusIndicator?: string;
}

export type DetailLabel =
  | "email"
  | "phone"
  | "address"
  | "move-in"
  | "date"
  | "status";

export interface DetailData {
  /** Whole body text; use excerpt for logging. */
  fullPageText: string;
  excerpt: string;
  emailsFound: string[];
  phonesFound: string[];
  datesFound: string[];
  /** Form field values keyed by name, id or a selector-derived key. */
  fields: Record<string, string>;
  labeled: Partial<Record<DetailLabel, string>>;
}

export interface TableChecks {
  nameFound: boolean;
  emailFound: boolean;
  dateFound: boolean;
  additionalDataFound: boolean;
}

export interface DetailChecks {
  emailFoundInDetail: boolean;
  phoneFoundInDetail: boolean;
  addressFoundInDetail: boolean;
  moveInDateFoundInDetail: boolean;
  additionalDetailsVerified: boolean;
}

export interface ApplicantVerification {
  foundInTable: boolean;
  rowClicked: boolean;
  detailPageLoaded: boolean;
  tableRow?: TableRowData;
  tableChecks?: TableChecks;
  detail?: DetailData;
  detailChecks?: DetailChecks;
  errors: string[];
}

export interface TableSummary {
  totalApplications: number;
  headers: string[];
  sampleRows: { rowIndex: number; rowText: string }[];
  errors: string[];
}
