// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/errors`
 * Purpose: Verifies suite error codes, cause chaining and single-line error descriptions.
 * Scope: Pure error helpers.
 * Side-effects: none
 * Links: src/shared/errors/index.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  ApartmentNotFoundError,
  ApplicationFormError,
  describeError,
  ElementInteractionError,
  isSuiteError,
  NavigationError,
} from "@/shared/errors";

describe("shared/errors", () => {
  it("tags each error class with its code", () => {
    expect(new ApartmentNotFoundError("none").code).toBe("APARTMENT_NOT_FOUND");
    expect(new ApplicationFormError("form").code).toBe("APPLICATION_FORM");
    expect(new NavigationError("nav").code).toBe("NAVIGATION");
    expect(new ElementInteractionError("click").code).toBe(
      "ELEMENT_INTERACTION"
    );
  });

  it("keeps the underlying cause", () => {
    const cause = new Error("timeout");
    const error = new ApplicationFormError("Error filling form", cause);

    expect(error.cause).toBe(cause);
    expect(error.name).toBe("ApplicationFormError");
    expect(new NavigationError("nav").cause).toBeUndefined();
  });

  it("recognises suite errors only", () => {
    expect(isSuiteError(new NavigationError("nav"))).toBe(true);
    expect(isSuiteError(new Error("plain"))).toBe(false);
    expect(isSuiteError("NAVIGATION")).toBe(false);
  });

  describe("describeError", () => {
    it("keeps the first line of a multi-line message", () => {
      const error = new Error(
        "locator.click: Timeout 5000ms exceeded.\nCall log:\n  - waiting for locator"
      );
      expect(describeError(error)).toBe(
        "locator.click: Timeout 5000ms exceeded."
      );
    });

    it("accepts strings and plain values", () => {
      expect(describeError("  went wrong  ")).toBe("went wrong");
      expect(describeError({ code: 42 })).toBe('{"code":42}');
      expect(describeError(undefined)).toBe("undefined");
    });

    it("falls back for blank messages and circular values", () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;

      expect(describeError(new Error(""))).toBe("unknown error");
      expect(describeError(circular)).toBe("[object Object]");
    });
  });
});
