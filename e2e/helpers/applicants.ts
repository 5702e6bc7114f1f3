// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/helpers/applicants`
 * Purpose: Fixed applicants matching the rows of the admin fixture page.
 * Scope: Data only.
 * Invariants: Anna's contact details equal the first row of e2e/fixtures/admin-applications.html.
 * Side-effects: none
 * @internal
 */

import type { PersonData } from "@/core";

export const ANNA: PersonData = {
  kind: "adult",
  salutation: "Ms.",
  firstName: "Anna",
  lastName: "Muster",
  email: "anna.muster@example.test",
  dateOfBirth: "14.03.1988",
  placeOfBirth: "Bern",
  civilStatus: "Married",
  nationality: "Switzerland",
  residencyStatus: "Swiss citizen",
  typeOfTenant: "Tenant",
  phoneNumber: "079 123 45 67",
  streetAndNumber: "Seeweg 4",
  postCode: "3000",
  city: "Bern",
  country: "Switzerland",
  moveInDate: "01.12.2026",
  civilLawResidence: true,
  relocationLast3Years: false,
  communityMember: false,
  employmentStatus: "Full-time",
  creditCheckType: "CreditTrust certificate",
  personalLiabilityInsurance: true,
  householdInsurance: true,
};

export const LENA: PersonData = {
  kind: "child",
  firstName: "Lena",
  lastName: "Muster",
  email: "",
  dateOfBirth: "02.09.2018",
  nationality: "Switzerland",
  nightsInApartment: 5,
};

export const MUSTER_FAMILY: readonly PersonData[] = [ANNA, LENA];
