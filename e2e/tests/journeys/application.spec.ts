// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@e2e/journeys/application`
 * Purpose: Full live application: listing, wishlist, all four form steps and final submission.
 * Scope: One run per applicant profile, attaching the run result to the report. With admin credentials set,
 *   each submitted family is then looked up in the admin panel.
 * Invariants: Journeys run serially; each submits a new application on the target site.
 * Side-effects: IO (network, browser, screenshots)
 * Links: src/flows/application-journey.flow.ts, src/core/application/factories.ts
 * @internal
 */

import { MathRandomRng } from "@/adapters";
import { createRequirementsFactory, type FamilyKind, type RequirementsData } from "@/core";
import { readyForAdminCheck, runAdminVerification, runApplicationJourney } from "@/flows";
import { suiteEnv } from "@/shared";

import { expect, test } from "../../helpers/fixtures";

const rng = new MathRandomRng();
const factory = createRequirementsFactory(rng);

const PROFILES: { name: string; family: FamilyKind; requirements: () => RequirementsData }[] = [
  { name: "realistic applicant", family: "standard", requirements: factory.realisticApplicant },
  { name: "maximalist applicant", family: "standard", requirements: factory.maximalistApplicant },
  { name: "single adult", family: "smoke", requirements: factory.realisticApplicant },
];

test.describe.configure({ mode: "serial" });

test.describe("Application journey", () => {
  for (const profile of PROFILES) {
    test(`submits an application for a ${profile.name}`, async ({ context, deps }, testInfo) => {
      const env = suiteEnv();
      const family = factory.family(profile.family);

      const result = await runApplicationJourney(context, deps, {
        urls: {
          listingUrl: env.LISTING_URL,
          applicationFormUrl: env.APPLICATION_FORM_URL,
          fallbackApplicationUrl: env.FALLBACK_APPLICATION_URL,
        },
        rng,
        requirements: profile.requirements(),
        family,
      });

      await testInfo.attach("run-result", {
        body: JSON.stringify({ family, result }, null, 2),
        contentType: "application/json",
      });
      expect(result.errorMessage).toBeUndefined();
      expect(result.status).toBe("submitted");

      if (!env.hasAdminCredentials || !readyForAdminCheck(result)) return;
      const { verification } = await runAdminVerification(await context.newPage(), deps, {
        adminUrl: env.ADMIN_URL,
        credentials: { username: env.ADMIN_USERNAME ?? "", password: env.ADMIN_PASSWORD ?? "" },
        family,
      });
      await testInfo.attach("verification", {
        body: JSON.stringify(verification, null, 2),
        contentType: "application/json",
      });
      expect(verification.foundInTable).toBe(true);
    });
  }
});
