// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/timings`
 * Purpose: Wait budgets shared by every page object.
 * Scope: Derives SuiteTimings from the suite env and provides a zero-delay preset. Does not perform waits.
 * Invariants: settleMs and highlightMs are pauses for the target site's client-side rendering; timeouts bound Playwright waits.
 * Side-effects: process.env (timingsFromEnv only)
 * Links: src/shared/env/suite.ts, src/pages/support/page-deps.ts
 * @public
 */

import { suiteEnv } from "@/shared/env";

export interface SuiteTimings {
  /** Bound for a single selector wait. */
  defaultTimeoutMs: number;
  /** Bound for waits on steps that render after a server round-trip. */
  slowTimeoutMs: number;
  networkIdleTimeoutMs: number;
  /** Pause after clicks that trigger client-side re-rendering. */
  settleMs: number;
  /** Pause after visually marking an element, so screenshots show it. */
  highlightMs: number;
  /** Per-keystroke delay when typing into fields. */
  typingDelayMs: number;
}

export function timingsFromEnv(): SuiteTimings {
  const env = suiteEnv();
  return {
    defaultTimeoutMs: env.DEFAULT_TIMEOUT_MS,
    slowTimeoutMs: env.SLOW_TIMEOUT_MS,
    networkIdleTimeoutMs: env.NETWORK_IDLE_TIMEOUT_MS,
    settleMs: env.SETTLE_MS,
    highlightMs: env.HIGHLIGHT_MS,
    typingDelayMs: env.TYPING_DELAY_MS,
  };
}

/** For fixture pages that render synchronously. */
export const INSTANT_TIMINGS: SuiteTimings = {
  defaultTimeoutMs: 2_000,
  slowTimeoutMs: 2_000,
  networkIdleTimeoutMs: 2_000,
  settleMs: 0,
  highlightMs: 0,
  typingDelayMs: 0,
};
