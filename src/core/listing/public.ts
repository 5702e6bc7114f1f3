// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/listing/public`
 * Purpose: Public surface of listing row interpretation.
 * Scope: Re-exports only.
 * Invariants: Named exports only
 * Side-effects: none
 * @public
 */

export {
  isApartmentRow,
  isDisabledClass,
  parseApartmentDetails,
  rowLabel,
} from "./rules";
