// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Observability barrel.
 * Scope: Re-exports logging.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export * from "./logging";
