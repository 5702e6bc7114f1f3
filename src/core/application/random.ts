// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/application/random`
 * Purpose: Draw helpers over the Rng port.
 * Scope: Bernoulli trial, uniform pick and inclusive integer range. Does not own a source of randomness.
 * Invariants: Each helper consumes exactly one rng.next() value.
 * Side-effects: none
 * Links: src/ports/rng.port.ts
 * @public
 */

import type { Rng } from "@/ports";

export function chance(rng: Rng, probability: number): boolean {
  return rng.next() < probability;
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  const index = Math.min(Math.floor(rng.next() * items.length), items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new RangeError("pick() called with an empty list");
  }
  return item;
}

/** Inclusive on both ends. */
export function intBetween(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}
