// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-rng`
 * Purpose: Rng that replays a scripted sequence so factories and selection are deterministic.
 * Scope: Implements the Rng port for tests. Does NOT replace Math.random globally.
 * Invariants: Values cycle through the sequence; reset() restarts it; every value is in [0, 1).
 * Side-effects: none
 * Notes: 0 makes every chance() true and every pick() take the first item; 0.99 does the opposite.
 * Links: src/ports/rng.port.ts
 * @public
 */

import type { Rng } from "@/ports";

export class FakeRng implements Rng {
  private sequence: number[];
  private index = 0;
  calls = 0;

  constructor(sequence: number[] = [0]) {
    this.sequence = FakeRng.checked(sequence);
  }

  next(): number {
    const value = this.sequence[this.index % this.sequence.length] ?? 0;
    this.index += 1;
    this.calls += 1;
    return value;
  }

  setSequence(sequence: number[]): void {
    this.sequence = FakeRng.checked(sequence);
    this.index = 0;
  }

  reset(): void {
    this.index = 0;
    this.calls = 0;
  }

  private static checked(sequence: number[]): number[] {
    if (sequence.length === 0) throw new RangeError("FakeRng needs at least one value");
    for (const value of sequence) {
      if (value < 0 || value >= 1) throw new RangeError(`FakeRng value out of range: ${value}`);
    }
    return sequence;
  }
}
