// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Entry file for port interfaces.
 * Scope: Re-exports port interfaces. Does not export implementations.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export type { Rng } from "./rng.port";
