// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/fakes/fake-rng`
 * Purpose: Guards the scripted rng used by the factory tests.
 * Scope: Sequence cycling, call counting and input validation.
 * Side-effects: none
 * Links: tests/_fakes/fake-rng.ts
 * @public
 */

import { FakeRng } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

describe("FakeRng", () => {
  it("cycles through its sequence", () => {
    const rng = new FakeRng([0.1, 0.2]);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([0.1, 0.2, 0.1]);
    expect(rng.calls).toBe(3);
  });

  it("restarts after reset and setSequence", () => {
    const rng = new FakeRng([0.1, 0.2]);
    rng.next();
    rng.reset();
    expect(rng.next()).toBe(0.1);

    rng.setSequence([0.7]);
    expect(rng.next()).toBe(0.7);
    expect(rng.calls).toBe(2);
  });

  it("rejects values outside [0, 1)", () => {
    expect(() => new FakeRng([])).toThrow(RangeError);
    expect(() => new FakeRng([1])).toThrow("FakeRng value out of range: 1");
  });
});
