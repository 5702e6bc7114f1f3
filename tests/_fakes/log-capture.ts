// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/log-capture`
 * Purpose: Real pino logger whose JSON lines are collected in memory for assertions.
 * Scope: Test-only logger factory. Does NOT write to stdout.
 * Invariants: Each entry is the parsed JSON of one log line, in emission order.
 * Side-effects: none
 * Links: src/shared/observability/logging/logger.ts
 * @public
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export interface CapturedLog {
  logger: Logger;
  entries: Record<string, unknown>[];
}

export function captureLogs(options: LoggerOptions = {}): CapturedLog {
  const entries: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug", base: null, timestamp: false, messageKey: "msg", ...options },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) {
          entries.push(Object.fromEntries(Object.entries(parsed)));
        }
      },
    }
  );
  return { logger, entries };
}
