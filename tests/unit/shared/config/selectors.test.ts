// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/config/selectors`
 * Purpose: Keeps the selector tables aligned with the page objects that read them.
 * Scope: Shape of the household dropdown and wishlist tables.
 * Side-effects: none
 * Links: src/shared/config/selectors.ts, src/core/application/dropdown-values.json
 * @public
 */

import { describe, expect, it } from "vitest";

import dropdownValues from "@/core/application/dropdown-values.json";
import { HOUSEHOLD, WISHLIST } from "@/shared/config";

describe("shared/config/selectors", () => {
  it("has exactly one toggle per household dropdown", () => {
    expect(Object.keys(HOUSEHOLD.toggles)).toEqual(Object.keys(dropdownValues));
    expect(HOUSEHOLD.toggles.householdType).toBe("#toggle-field-household_type");
  });

  it("keeps only the wishlist chains the page objects use", () => {
    expect(Object.keys(WISHLIST)).toEqual(["panel", "applyButtons"]);
  });
});
