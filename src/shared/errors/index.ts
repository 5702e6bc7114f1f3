// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/errors`
 * Purpose: Error types raised by page objects and journeys when a step of the rental flow cannot proceed.
 * Scope: Exports the error hierarchy, a type guard and a message normalizer. Does not log or capture screenshots.
 * Invariants:
 * - Every suite error carries a stable `code` and preserves the underlying failure as `cause`.
 * - describeError never throws.
 * Side-effects: none
 * Links: Used by src/pages/**, src/flows/**
 * @public
 */

export type SuiteErrorCode =
  | "APARTMENT_NOT_FOUND"
  | "APPLICATION_FORM"
  | "NAVIGATION"
  | "ELEMENT_INTERACTION";

export class SuiteError extends Error {
  readonly code: SuiteErrorCode;

  constructor(code: SuiteErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SuiteError";
    this.code = code;
  }
}

/** No listing row looked like an apartment. */
export class ApartmentNotFoundError extends SuiteError {
  constructor(message: string, cause?: unknown) {
    super("APARTMENT_NOT_FOUND", message, cause);
    this.name = "ApartmentNotFoundError";
  }
}

export class ApplicationFormError extends SuiteError {
  constructor(message: string, cause?: unknown) {
    super("APPLICATION_FORM", message, cause);
    this.name = "ApplicationFormError";
  }
}

export class NavigationError extends SuiteError {
  constructor(message: string, cause?: unknown) {
    super("NAVIGATION", message, cause);
    this.name = "NavigationError";
  }
}

export class ElementInteractionError extends SuiteError {
  constructor(message: string, cause?: unknown) {
    super("ELEMENT_INTERACTION", message, cause);
    this.name = "ElementInteractionError";
  }
}

export function isSuiteError(error: unknown): error is SuiteError {
  return error instanceof SuiteError;
}

/**
 * Single-line message for any thrown value.
 * Playwright errors carry a multi-line call log; only the first line is kept.
 */
export function describeError(error: unknown): string {
  let raw: string;
  if (error instanceof Error) {
    raw = error.message;
  } else if (typeof error === "string") {
    raw = error;
  } else {
    try {
      raw = JSON.stringify(error) ?? String(error);
    } catch {
      raw = String(error);
    }
  }
  const firstLine = raw.split("\n")[0]?.trim() ?? "";
  return firstLine.length > 0 ? firstLine : "unknown error";
}
