// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/random/math-random`
 * Purpose: Rng backed by Math.random for live journeys.
 * Scope: Provides non-deterministic floats in [0, 1).
 * Invariants: Delegates directly to Math.random
 * Side-effects: none
 * Links: Implements Rng port
 * @internal
 */

import type { Rng } from "@/ports";

export class MathRandomRng implements Rng {
  next(): number {
    return Math.random();
  }
}
