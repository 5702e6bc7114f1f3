// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys; applicant personal data is synthetic and stays visible.
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  "password",
  "username",
  "credentials.password",
  "credentials.username",
  "ADMIN_PASSWORD",
  "ADMIN_USERNAME",
  "iban",
  "household.iban",
];
