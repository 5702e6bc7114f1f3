// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/application/dropdowns`
 * Purpose: Resolve a visible dropdown label to the option the target form renders for it.
 * Scope: Label to data-value lookup per dropdown, and text matching over rendered option labels. Does not touch the DOM.
 * Invariants:
 * - Lookups are scoped per dropdown, so a shared label such as "Other" resolves to that dropdown's own value.
 * - pickOptionByText prefers an exact (trimmed, case-insensitive) match over a containment match.
 * Side-effects: none
 * Links: dropdown-values.json, src/pages/household-form.page.ts
 * @public
 */

import dropdownValues from "./dropdown-values.json";

export type HouseholdDropdown = keyof typeof dropdownValues;

export function dataValueFor(
  dropdown: HouseholdDropdown,
  label: string
): string | undefined {
  const table: Record<string, string> = dropdownValues[dropdown];
  return Object.hasOwn(table, label) ? table[label] : undefined;
}

/**
 * Index of the option whose text matches `value`, or -1.
 * Blank options never match.
 */
export function pickOptionByText(
  options: readonly (string | null)[],
  value: string
): number {
  const wanted = value.trim().toLowerCase();
  const normalized = options.map((o) => (o ?? "").trim().toLowerCase());

  const exact = normalized.findIndex((o) => o.length > 0 && o === wanted);
  if (exact !== -1) return exact;

  return normalized.findIndex((o) => o.length > 0 && o.includes(wanted));
}
