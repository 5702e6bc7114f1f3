// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/application/public`
 * Purpose: Public surface of the application data domain.
 * Scope: Re-exports model types, factories and dropdown resolution.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  dataValueFor,
  type HouseholdDropdown,
  pickOptionByText,
} from "./dropdowns";
export {
  createRequirementsFactory,
  type FactoryOptions,
  firstOfMonthAfter,
  formatSwissDate,
  type RequirementsFactory,
} from "./factories";
export {
  type ApartmentDetails,
  type ApplicationStatus,
  type CreditCheckType,
  emptyParking,
  emptyRequirements,
  type FamilyKind,
  fullName,
  type HouseholdData,
  type ParkingRequirements,
  type PersonData,
  type PersonKind,
  type RequirementsData,
  type RunResult,
  type SecurityDepositType,
} from "./model";
export { chance, intBetween, pick } from "./random";
