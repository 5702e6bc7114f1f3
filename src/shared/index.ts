// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared`
 * Purpose: Shared ambient stack barrel export.
 * Scope: Re-exports config, env validation, errors and observability. Does not contain page logic.
 * Invariants: Pure re-exports only, no side effects
 * Side-effects: none
 * Links: Used across all layers
 * @public
 */

export * from "./config";
export * from "./env";
export * from "./errors";
export * from "./observability";
