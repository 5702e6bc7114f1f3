// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/suite`
 * Purpose: Suite environment validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for target URLs, admin credentials, timing and artifact settings. Does not launch browsers.
 * Invariants: Parsed once and cached; fails fast with EnvValidationError listing missing and invalid keys.
 * Side-effects: process.env
 * Notes: Admin credentials are optional; admin journeys skip themselves when they are absent.
 *        resetSuiteEnv exists for unit tests that mutate process.env.
 * Links: playwright.config.ts, src/shared/config/timings.ts
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid suite env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const suiteSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Target site
  LISTING_URL: z
    .string()
    .url()
    .default("https://mostar.api.demo.ch.melon.market/"),
  APPLICATION_FORM_URL: z
    .string()
    .url()
    .default("https://mostar.demo.melon.market/form/application/new"),
  FALLBACK_APPLICATION_URL: z
    .string()
    .url()
    .default(
      "https://mostar.demo.melon.market/form/application/new?uuids=e34bfbd2-218e-4f36-9e92-e2ae9367fcfc&lang=en"
    ),
  ADMIN_URL: z.string().url().default("https://mostar.demo.ch.melon.market/"),

  // Admin panel credentials (never committed)
  ADMIN_USERNAME: z.string().min(1).optional(),
  ADMIN_PASSWORD: z.string().min(1).optional(),

  // Timing
  DEFAULT_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  SLOW_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  NETWORK_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SETTLE_MS: z.coerce.number().int().min(0).default(1_000),
  HIGHLIGHT_MS: z.coerce.number().int().min(0).default(500),
  TYPING_DELAY_MS: z.coerce.number().int().min(0).default(50),

  // Browser
  HEADLESS: booleanFlag.default("true"),
  SLOW_MO_MS: z.coerce.number().int().min(0).default(0),

  // Artifacts and logging
  SCREENSHOT_DIR: z.string().min(1).default("e2e/artifacts/screenshots"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type SuiteEnv = z.infer<typeof suiteSchema> & {
  hasAdminCredentials: boolean;
};

let ENV: SuiteEnv | null = null;

export function suiteEnv(): SuiteEnv {
  if (ENV === null) {
    try {
      const parsed = suiteSchema.parse(process.env);
      ENV = {
        ...parsed,
        hasAdminCredentials:
          parsed.ADMIN_USERNAME !== undefined &&
          parsed.ADMIN_PASSWORD !== undefined,
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/** Drop the cached env so the next suiteEnv() call re-reads process.env. */
export function resetSuiteEnv(): void {
  ENV = null;
}

export type { SuiteEnv };
