// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/listing/rules`
 * Purpose: Interpret the text of a listing row: is it an apartment, and what does it say about rooms, price, size and availability.
 * Scope: Pure string parsing. Does not query the DOM.
 * Invariants: Missing facts stay undefined; fullText is the trimmed input.
 * Side-effects: none
 * Links: src/pages/apartment-listing.page.ts
 * @public
 */

import type { ApartmentDetails } from "@/core/application/model";

const APARTMENT_KEYWORDS = [
  "available",
  "rooms",
  "apartment",
  "flat",
  "wishlist",
  "apply",
] as const;

const AVAILABLE_KEYWORDS = ["available", "verfügbar", "free", "frei"] as const;

const ROOMS = /(\d+(?:\.\d+)?)\s*(?:room|zimmer)/i;
const PRICE = /(CHF|Fr\.?|€|\$)\s*(\d+(?:[,.]\d+)*)/i;
const SIZE = /(\d+(?:\.\d+)?)\s*m[²2]/i;
const LEADING_ID = /^([A-Z0-9]+)/;

export function isApartmentRow(text: string): boolean {
  const lower = text.toLowerCase();
  return APARTMENT_KEYWORDS.some((k) => lower.includes(k));
}

export function isDisabledClass(classAttr: string | null): boolean {
  return (classAttr ?? "").toLowerCase().includes("disabled");
}

export function parseApartmentDetails(text: string): ApartmentDetails {
  const fullText = text.trim();
  const details: ApartmentDetails = { fullText };

  const rooms = ROOMS.exec(text);
  if (rooms?.[1]) details.rooms = rooms[1];

  const price = PRICE.exec(text);
  if (price?.[1] && price[2]) details.price = `${price[1]}${price[2]}`;

  const size = SIZE.exec(text);
  if (size?.[1]) details.size = `${size[1]}m²`;

  const lower = text.toLowerCase();
  if (AVAILABLE_KEYWORDS.some((k) => lower.includes(k))) {
    details.status = "Available";
  }

  const id = LEADING_ID.exec(fullText);
  if (id?.[1]) details.apartmentId = id[1];

  return details;
}

/** First whitespace-separated token, used to name a row in logs. */
export function rowLabel(text: string | null): string {
  return text?.trim().split(/\s+/)[0] || "unknown";
}
