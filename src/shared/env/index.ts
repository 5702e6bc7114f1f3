// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for the validated suite environment.
 * Scope: Re-exports the env accessor, its type and validation error. Does not export the internal schema.
 * Invariants: Only re-exports public APIs.
 * Side-effects: process.env
 * @public
 */

export type { EnvValidationMeta, SuiteEnv } from "./suite";
export { EnvValidationError, resetSuiteEnv, suiteEnv } from "./suite";
