// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/admin/public`
 * Purpose: Public surface of admin-panel interpretation and verification.
 * Scope: Re-exports only.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  EXCERPT_LENGTH,
  extractDetailData,
  extractLabeledInfo,
  fieldKey,
  findDates,
  findEmails,
  findPhones,
  findStatus,
  identifyRowData,
  SAMPLE_ROW_COUNT,
  SAMPLE_ROW_LENGTH,
  summarizeTable,
} from "./extraction";
export {
  applicantRowTexts,
  nameVariants,
  rowMatchesApplicant,
  stripPhone,
} from "./matching";
export type {
  ApplicantVerification,
  DetailChecks,
  DetailData,
  DetailLabel,
  TableChecks,
  TableRowData,
  TableSummary,
} from "./model";
export {
  countPassed,
  emptyVerification,
  summarizeVerification,
  verifyDetailedData,
  verifyTableData,
} from "./verification";
