// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/admin/matching`
 * Purpose: Decide which applications-table row belongs to a given applicant.
 * Scope: Search texts for row lookup and a fallback predicate over row text. Does not query the DOM.
 * Invariants: Comparisons are case-insensitive; empty fields never match.
 * Side-effects: none
 * Links: src/pages/admin-applications.page.ts
 * @public
 */

import type { PersonData } from "@/core/application/model";

type Identity = Pick<PersonData, "firstName" | "lastName" | "email">;

/** Most specific first: full name, reversed name, email, surname, first name. */
export function applicantRowTexts(person: Identity): string[] {
  const { firstName, lastName, email } = person;
  const candidates = [
    firstName && lastName ? `${firstName} ${lastName}` : "",
    firstName && lastName ? `${lastName}, ${firstName}` : "",
    email,
    lastName,
    firstName,
  ];
  return candidates.filter((c) => c.length > 0);
}

function containsField(haystack: string, value: string): boolean {
  return value.length > 0 && haystack.includes(value.toLowerCase());
}

export function rowMatchesApplicant(rowText: string | null, person: Identity): boolean {
  if (!rowText) return false;
  const text = rowText.toLowerCase();
  return (
    containsField(text, person.lastName) ||
    containsField(text, person.email) ||
    (containsField(text, person.firstName) && containsField(text, person.lastName))
  );
}

export function nameVariants(person: Identity): string[] {
  return applicantRowTexts({ ...person, email: "" }).map((v) => v.toLowerCase());
}

export function stripPhone(phone: string): string {
  return phone.replace(/[\s-]/g, "");
}
