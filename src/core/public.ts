// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports the application, listing and admin domains. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by pages and flows via the @/core alias
 * @public
 */

export {
  type ApplicantVerification,
  applicantRowTexts,
  countPassed,
  type DetailChecks,
  type DetailData,
  type DetailLabel,
  emptyVerification,
  EXCERPT_LENGTH,
  extractDetailData,
  extractLabeledInfo,
  fieldKey,
  findDates,
  findEmails,
  findPhones,
  findStatus,
  identifyRowData,
  nameVariants,
  rowMatchesApplicant,
  SAMPLE_ROW_COUNT,
  SAMPLE_ROW_LENGTH,
  stripPhone,
  summarizeTable,
  summarizeVerification,
  type TableChecks,
  type TableRowData,
  type TableSummary,
  verifyDetailedData,
  verifyTableData,
} from "./admin/public";
export {
  type ApartmentDetails,
  type ApplicationStatus,
  chance,
  type CreditCheckType,
  createRequirementsFactory,
  dataValueFor,
  emptyParking,
  emptyRequirements,
  type FactoryOptions,
  type FamilyKind,
  firstOfMonthAfter,
  formatSwissDate,
  fullName,
  type HouseholdData,
  type HouseholdDropdown,
  intBetween,
  type ParkingRequirements,
  type PersonData,
  type PersonKind,
  pick,
  pickOptionByText,
  type RequirementsData,
  type RequirementsFactory,
  type RunResult,
  type SecurityDepositType,
} from "./application/public";
export {
  isApartmentRow,
  isDisabledClass,
  parseApartmentDetails,
  rowLabel,
} from "./listing/public";
