// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/phase`
 * Purpose: Timed logging around one phase of a journey.
 * Scope: Logs start, completion and failure of an async phase with consistent keys (phase, durationMs). Does not retry or swallow.
 * Invariants: Failures are logged once and rethrown unchanged.
 * Side-effects: IO (emits structured log entries via provided logger), time
 * Links: src/flows/**
 * @public
 */

import type { Logger } from "pino";

export async function logPhase<T>(
  log: Logger,
  phase: string,
  run: () => Promise<T>,
  context: Record<string, unknown> = {}
): Promise<T> {
  const startedAt = Date.now();
  log.info({ phase, ...context }, "phase started");
  try {
    const result = await run();
    log.info({ phase, durationMs: Date.now() - startedAt }, "phase complete");
    return result;
  } catch (error) {
    log.error(
      { phase, durationMs: Date.now() - startedAt, err: error },
      "phase failed"
    );
    throw error;
  }
}
