// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/admin/extraction`
 * Purpose: Pull emails, phone numbers, dates, status words and labelled values out of admin-panel text.
 * Scope: Pure text extraction over strings read from the page. Does not query the DOM.
 * Invariants: Results preserve document order; nothing is deduplicated.
 * Side-effects: none
 * Links: src/pages/admin-applications.page.ts
 * @public
 */

import type { DetailData, DetailLabel, TableRowData, TableSummary } from "./model";

const EMAIL = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE = /\b\d{2,3}[-.\s]?\d{3}[-.\s]?\d{2}[-.\s]?\d{2}\b/g;
const SWISS_DATE = /\b\d{2}\.\d{2}\.\d{4}\b/g;

const STATUS_KEYWORDS = [
  "pending",
  "approved",
  "rejected",
  "new",
  "submitted",
  "ausstehend",
  "genehmigt",
  "abgelehnt",
  "neu",
  "eingereicht",
] as const;

const LABEL_PATTERNS: readonly (readonly [DetailLabel, readonly string[]])[] = [
  ["email", ["email", "e-mail", "@"]],
  ["phone", ["phone", "tel", "mobile"]],
  ["address", ["address", "street", "strasse"]],
  ["move-in", ["move-in", "move in", "einzug"]],
  ["date", ["date", "datum"]],
  ["status", ["status", "state"]],
];

export const EXCERPT_LENGTH = 1000;
export const SAMPLE_ROW_LENGTH = 200;
export const SAMPLE_ROW_COUNT = 5;

export function findEmails(text: string): string[] {
  return text.match(EMAIL) ?? [];
}

export function findPhones(text: string): string[] {
  return text.match(PHONE) ?? [];
}

export function findDates(text: string): string[] {
  return text.match(SWISS_DATE) ?? [];
}

export function findStatus(text: string): string | undefined {
  const lower = text.toLowerCase();
  return STATUS_KEYWORDS.find((k) => lower.includes(k));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Text following "<label>:" up to the end of its line, per known label. */
export function extractLabeledInfo(
  pageText: string
): Partial<Record<DetailLabel, string>> {
  const labeled: Partial<Record<DetailLabel, string>> = {};
  for (const [label, patterns] of LABEL_PATTERNS) {
    for (const pattern of patterns) {
      const match = new RegExp(`${escapeRegExp(pattern)}:?\\s*([^\\n\\r]+)`, "i").exec(
        pageText
      );
      const value = match?.[1]?.trim();
      if (value) {
        labeled[label] = value;
        break;
      }
    }
  }
  return labeled;
}

export function identifyRowData(fullRowText: string, cells: readonly (string | null)[]): TableRowData {
  const text = fullRowText.trim();
  const row: TableRowData = {
    fullRowText: text,
    cells: cells.map((c) => (c ?? "").trim()).filter((c) => c.length > 0),
    datesFound: findDates(text),
  };
  const email = findEmails(text)[0];
  if (email) row.email = email;
  const status = findStatus(text);
  if (status) row.statusIndicator = status;
  return row;
}

/** Key for a detail-view form field lacking both name and id. */
export function fieldKey(selector: string, name: string | null, index: number): string {
  if (name) return name;
  const base = selector.replace(/\[/g, "_").replace(/]/g, "").replace(/=/g, "_");
  return `${base}_${index}`;
}

export function extractDetailData(
  pageText: string,
  fields: Record<string, string> = {}
): DetailData {
  return {
    fullPageText: pageText,
    excerpt: pageText.slice(0, EXCERPT_LENGTH),
    emailsFound: findEmails(pageText),
    phonesFound: findPhones(pageText),
    datesFound: findDates(pageText),
    fields,
    labeled: extractLabeledInfo(pageText),
  };
}

export function summarizeTable(
  headers: readonly (string | null)[],
  rows: readonly (string | null)[]
): TableSummary {
  const sampleRows: TableSummary["sampleRows"] = [];
  rows.slice(0, SAMPLE_ROW_COUNT).forEach((row, rowIndex) => {
    const text = (row ?? "").trim();
    if (text) sampleRows.push({ rowIndex, rowText: text.slice(0, SAMPLE_ROW_LENGTH) });
  });
  return {
    totalApplications: rows.length,
    headers: headers.map((h) => (h ?? "").trim()).filter((h) => h.length > 0),
    sampleRows,
    errors: [],
  };
}
