// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/application/random`
 * Purpose: Unit tests for the Rng-driven helpers behind generated applicants.
 * Scope: chance, pick and intBetween against scripted rng sequences.
 * Side-effects: none
 * Links: src/core/application/random.ts
 * @public
 */

import { FakeRng } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { chance, intBetween, pick } from "@/core";

describe("core/application/random", () => {
  it("chance is true strictly below the probability", () => {
    expect(chance(new FakeRng([0.29]), 0.3)).toBe(true);
    expect(chance(new FakeRng([0.3]), 0.3)).toBe(false);
    expect(chance(new FakeRng([0]), 0)).toBe(false);
  });

  it("pick maps the draw onto the list", () => {
    const items = ["a", "b", "c"];
    expect(pick(new FakeRng([0]), items)).toBe("a");
    expect(pick(new FakeRng([0.5]), items)).toBe("b");
    expect(pick(new FakeRng([0.999]), items)).toBe("c");
  });

  it("pick rejects an empty list", () => {
    expect(() => pick(new FakeRng(), [])).toThrow(
      new RangeError("pick() called with an empty list")
    );
  });

  it("intBetween is inclusive on both ends", () => {
    expect(intBetween(new FakeRng([0]), 1, 3)).toBe(1);
    expect(intBetween(new FakeRng([0.5]), 1, 3)).toBe(2);
    expect(intBetween(new FakeRng([0.99]), 1, 3)).toBe(3);
  });

  it("consumes one draw per call", () => {
    const rng = new FakeRng([0.1, 0.9]);
    expect(chance(rng, 0.5)).toBe(true);
    expect(chance(rng, 0.5)).toBe(false);
    expect(chance(rng, 0.5)).toBe(true);
    expect(rng.calls).toBe(3);
  });
});
