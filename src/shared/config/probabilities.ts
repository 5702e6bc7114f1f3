// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/probabilities`
 * Purpose: Likelihood of each optional requirement in generated applicants.
 * Scope: Constants only.
 * Invariants: Every value lies in [0, 1].
 * Side-effects: none
 * Links: src/core/application/factories.ts
 * @public
 */

export const REQUIREMENT_PROBABILITIES = {
  parking: 0.3,
  parkingKind: 0.4,
  parkingReason: 0.6,
  carSharing: 0.2,
  motorbike: 0.1,
  bike: 0.7,
  electricBike: 0.3,
  additionalRoom: 0.25,
  storageRoom: 0.4,
  workshop: 0.15,
  coworking: 0.25,
  homeOffice: 0.6,
  accessibility: 0.05,
} as const;

export const HOUSEHOLD_PROBABILITIES = {
  pets: 0.3,
  musicInstruments: 0.2,
  smoker: 0.15,
  moveDate: 0.4,
  mailboxLabel: 0.6,
  deposit: 0.8,
  incomeRentRatio: 0.7,
  bankDetails: 0.5,
  participationIdeas: 0.6,
  cooperativeRelation: 0.4,
  remarks: 0.3,
} as const;

export type RequirementProbabilities = typeof REQUIREMENT_PROBABILITIES;
export type HouseholdProbabilities = typeof HOUSEHOLD_PROBABILITIES;
