// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@flows`
 * Purpose: Journeys composed from page objects.
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export {
  type AdminVerificationOptions,
  type AdminVerificationPhase,
  type AdminVerificationResult,
  adminVerificationPhases,
  applicationsUrlFor,
  readyForAdminCheck,
  runAdminVerification,
} from "./admin-verification.flow";
export {
  type JourneyOptions,
  type JourneyUrls,
  runApplicationJourney,
} from "./application-journey.flow";
