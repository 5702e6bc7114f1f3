// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers for suite runs. Does not format output.
 * Invariants: Always emits JSON to stdout; silenced under Vitest. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads PINO_LOG_LEVEL and NODE_ENV directly to avoid triggering full env validation at import time.
 *        Pipe through pino-pretty locally if human-readable output is wanted.
 * Links: REDACT_PATHS; used by e2e/helpers/fixtures.ts and src/flows/**.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.PINO_LOG_LEVEL ?? "info";

  return pino(
    {
      level,
      enabled: !(isVitest || nodeEnv === "test"),
      base: { ...bindings, app: "rental-flow-e2e" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    // sync: a failing test must not lose its last lines
    pino.destination({ dest: 1, sync: true })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
