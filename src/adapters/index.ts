// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters`
 * Purpose: Adapter entry point.
 * Scope: Re-exports port implementations.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export { MathRandomRng } from "./random/math-random.adapter";
