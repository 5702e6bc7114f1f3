// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/rng.port`
 * Purpose: Randomness abstraction for deterministic test data generation.
 * Scope: Uniform float source plus derived helpers' contract. Does not seed or persist state.
 * Invariants: next() returns a float in [0, 1).
 * Side-effects: none (interface only)
 * Links: Implemented by MathRandomRng and tests/_fakes/fake-rng.ts; used by core factories and listing selection
 * @public
 */

export interface Rng {
  next(): number;
}
