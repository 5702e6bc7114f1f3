// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/journeys/admin-verification`
 * Purpose: Live admin smoke check: log in and read the applications table.
 * Scope: Runs only when ADMIN_USERNAME and ADMIN_PASSWORD are set. The looked-up family was never submitted, so
 *   only the table is asserted; submitted families are verified by the application journey.
 * Invariants: Credentials come from the environment only.
 * Side-effects: IO (network, browser, screenshots)
 * Links: src/flows/admin-verification.flow.ts
 * @internal
 */

import { MathRandomRng } from "@/adapters";
import { createRequirementsFactory } from "@/core";
import { runAdminVerification } from "@/flows";
import { suiteEnv } from "@/shared";

import { expect, test } from "../../helpers/fixtures";

test.describe("Admin verification", () => {
  test.skip(!suiteEnv().hasAdminCredentials, "ADMIN_USERNAME and ADMIN_PASSWORD are not set");

  test("logs in and reads the applications table", async ({ page, deps }, testInfo) => {
    const env = suiteEnv();
    const family = createRequirementsFactory(new MathRandomRng()).family("smoke");

    const { table, verification } = await runAdminVerification(page, deps, {
      adminUrl: env.ADMIN_URL,
      credentials: { username: env.ADMIN_USERNAME ?? "", password: env.ADMIN_PASSWORD ?? "" },
      family,
    });

    await testInfo.attach("verification", {
      body: JSON.stringify({ table, verification }, null, 2),
      contentType: "application/json",
    });
    expect(table.errors).toEqual([]);
    expect(table.totalApplications).toBeGreaterThan(0);
  });
});
