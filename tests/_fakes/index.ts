// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Barrel for deterministic test doubles.
 * Scope: Re-exports fakes. Does NOT export real implementations.
 * Invariants: All fakes available via barrel export.
 * Side-effects: none
 * Notes: Import fakes from here to replace RNG and log output in unit tests.
 * @public
 */

export { FakeRng } from "./fake-rng";
export { type CapturedLog, captureLogs } from "./log-capture";
