// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/listing/rules`
 * Purpose: Unit tests for listing row recognition and apartment detail parsing.
 * Scope: Pure text rules over row text and class attributes.
 * Side-effects: none
 * Links: src/core/listing/rules.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  isApartmentRow,
  isDisabledClass,
  parseApartmentDetails,
  rowLabel,
} from "@/core";

describe("core/listing/rules", () => {
  it("recognises apartment rows by keyword", () => {
    expect(isApartmentRow("A101 3.5 Rooms CHF 2,150")).toBe(true);
    expect(isApartmentRow("Add to Wishlist")).toBe(true);
    expect(isApartmentRow("Contact us")).toBe(false);
  });

  it("reads a disabled marker from the class attribute", () => {
    expect(isDisabledClass("bewerben Disabled")).toBe(true);
    expect(isDisabledClass("bewerben")).toBe(false);
    expect(isDisabledClass(null)).toBe(false);
  });

  describe("parseApartmentDetails", () => {
    it("extracts every fact from an English row", () => {
      expect(
        parseApartmentDetails("  A101 3.5 rooms CHF 2,150 82 m² Available  ")
      ).toEqual({
        fullText: "A101 3.5 rooms CHF 2,150 82 m² Available",
        rooms: "3.5",
        price: "CHF2,150",
        size: "82m²",
        status: "Available",
        apartmentId: "A101",
      });
    });

    it("understands German rows", () => {
      expect(parseApartmentDetails("W12 4.5 Zimmer Fr. 1900 95 m2 frei")).toEqual({
        fullText: "W12 4.5 Zimmer Fr. 1900 95 m2 frei",
        rooms: "4.5",
        price: "Fr.1900",
        size: "95m²",
        status: "Available",
        apartmentId: "W12",
      });
    });

    it("keeps only the full text when nothing is recognised", () => {
      expect(parseApartmentDetails("coming soon")).toEqual({
        fullText: "coming soon",
      });
    });
  });

  it("labels a row by its first token", () => {
    expect(rowLabel("  B202  2.5 rooms")).toBe("B202");
    expect(rowLabel("   ")).toBe("unknown");
    expect(rowLabel(null)).toBe("unknown");
  });
});
