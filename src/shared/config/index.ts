// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config`
 * Purpose: Public surface for selectors, probabilities and timings.
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export {
  HOUSEHOLD_PROBABILITIES,
  type HouseholdProbabilities,
  REQUIREMENT_PROBABILITIES,
  type RequirementProbabilities,
} from "./probabilities";
export {
  ADMIN,
  FORM,
  HOUSEHOLD,
  LISTING,
  PEOPLE,
  REQUIREMENTS,
  STEPS,
  SUMMARY,
  WISHLIST,
} from "./selectors";
export { INSTANT_TIMINGS, type SuiteTimings, timingsFromEnv } from "./timings";
