// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/application/factories`
 * Purpose: Unit tests for generated applicants, fixed scenarios and families.
 * Scope: Drives the factory with scripted rng values so every optional branch is either always or never taken.
 * Invariants: rng 0 takes every optional branch and the first catalog entry; rng 0.99 takes none and the last entry.
 * Side-effects: none
 * Links: src/core/application/factories.ts, src/core/application/catalog.json
 * @public
 */

import { FakeRng } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  createRequirementsFactory,
  emptyRequirements,
  firstOfMonthAfter,
  formatSwissDate,
  type HouseholdData,
} from "@/core";

const TODAY = new Date(2026, 9, 18);

function factoryWith(value: number) {
  const rng = new FakeRng([value]);
  return { rng, factory: createRequirementsFactory(rng, { today: TODAY }) };
}

describe("core/application/factories", () => {
  describe("dates", () => {
    it("formats dd.mm.yyyy with zero padding", () => {
      expect(formatSwissDate(new Date(2026, 0, 5))).toBe("05.01.2026");
    });

    it("rolls months over the year end", () => {
      expect(firstOfMonthAfter(TODAY, 3)).toBe("01.01.2027");
      expect(firstOfMonthAfter(new Date(2026, 11, 31), 2)).toBe("01.02.2027");
    });
  });

  describe("realisticApplicant", () => {
    it("takes every optional branch when the rng draws 0", () => {
      const { factory } = factoryWith(0);

      expect(factory.realisticApplicant()).toEqual({
        parking: {
          wantsParking: true,
          regularSpaces: 1,
          smallSpaces: 1,
          largeSpaces: 1,
          electricSpaces: 1,
          electricSmallSpaces: 0,
          outdoorSpaces: 1,
          specialSpaces: 0,
          reason: "Need car for work commute",
        },
        household: {
          householdType: "couple household with child",
          hasPets: true,
          hasMusicInstruments: true,
          isSmoker: true,
          relocationReason: "Change of life situation",
          desiredMoveDate: "01.01.2027",
          mailboxLabel: "Muster Family",
          securityDepositType: "deposit",
          incomeRentRatio: true,
          iban: "CH00 0000 0000 0000 0000 0",
          bankName: "Test Bank",
          accountOwner: "Anna Muster",
          motivation: "Looking for a community-oriented living space",
          participationIdeas: "Interested in community garden and events",
          relationToCooperative: "Current tenant",
          objectFoundOn:
            "Real estate platform (Newhome, Erstbezug, Homegate, ...)",
          remarks: "Excited to be part of the community!",
        },
        wantsCarSharing: true,
        wantsMotorbikeParking: true,
        motorbikeSpaces: 1,
        wantsBikeParking: true,
        bikeSpaces: 1,
        electricBikeSpaces: 1,
        wantsAdditionalRoom: true,
        additionalRoomPurpose: "Home office",
        additionalRoomArea: "10-15 m²",
        wantsStorageRoom: true,
        storageRoomPurpose: "Seasonal items storage",
        storageRoomArea: "3-5 m²",
        wantsWorkshop: true,
        workshopPurpose: "Art and painting",
        wantsCoworking: true,
        wantsHomeOffice: true,
        homeOfficeReason: "Remote work policy",
        needsObstacleFree: true,
      });
    });

    it("takes no optional branch when the rng draws 0.99", () => {
      const { factory } = factoryWith(0.99);
      const household: HouseholdData = {
        householdType: "couple household with child",
        hasPets: false,
        hasMusicInstruments: false,
        isSmoker: false,
        relocationReason: "Other",
        securityDepositType: "insurance",
        incomeRentRatio: false,
        motivation: "Looking for a community-oriented living space",
        objectFoundOn: "LinkedIn",
      };

      expect(factory.realisticHousehold()).toEqual(household);
      expect(factory.realisticApplicant()).toEqual(
        emptyRequirements(household)
      );
    });

    it("repeats itself for the same rng sequence", () => {
      const sequence = [0.12, 0.87, 0.45, 0.03, 0.66];
      const a = createRequirementsFactory(new FakeRng(sequence), {
        today: TODAY,
      });
      const b = createRequirementsFactory(new FakeRng(sequence), {
        today: TODAY,
      });

      expect(a.realisticApplicant()).toEqual(b.realisticApplicant());
    });
  });

  describe("fixed scenarios", () => {
    it("builds the maximalist applicant without drawing", () => {
      const { rng, factory } = factoryWith(0.5);
      const data = factory.maximalistApplicant();

      expect(rng.calls).toBe(0);
      expect(data.parking.regularSpaces).toBe(2);
      expect(data.household.desiredMoveDate).toBe("01.01.2027");
      expect(data.household.relationType).toBe("Workplace in the neighborhood");
      expect(data.needsObstacleFree).toBe(true);
    });

    it("answers no to everything for the minimal applicant", () => {
      const { factory } = factoryWith(0);
      expect(factory.minimalApplicant()).toEqual(emptyRequirements());
    });

    it("carries out-of-range parking for the invalid applicant", () => {
      const { factory } = factoryWith(0);
      const { parking } = factory.invalidApplicant();

      expect(parking.wantsParking).toBe(true);
      expect(parking.regularSpaces).toBe(-5);
      expect(parking.reason).toHaveLength(1000);
    });
  });

  describe("family", () => {
    it("builds a single adult for the smoke family", () => {
      const { factory } = factoryWith(0);

      expect(factory.family("smoke")).toEqual([
        {
          kind: "adult",
          salutation: "Ms.",
          firstName: "Anna",
          lastName: "TestFamily100000",
          email: "anna.testfamily100000@example.com",
          dateOfBirth: "14.03.1988",
          placeOfBirth: "Zürich",
          civilStatus: "Married",
          nationality: "Switzerland",
          residencyStatus: "Swiss citizen",
          typeOfTenant: "Tenant",
          phoneNumber: "079 123 45 67",
          streetAndNumber: "Bahnhofstrasse 12",
          postCode: "8001",
          city: "Zürich",
          country: "Switzerland",
          moveInDate: "01.04.2021",
          civilLawResidence: true,
          relocationLast3Years: false,
          communityMember: false,
          employmentStatus: "Full-time",
          creditCheckType: "CreditTrust certificate",
          personalLiabilityInsurance: true,
          householdInsurance: true,
        },
      ]);
    });

    it("gives the standard family two distinct adults and a child", () => {
      const { factory } = factoryWith(0);
      const [first, second, child] = factory.family("standard");

      expect(first?.firstName).toBe("Anna");
      expect(second?.firstName).toBe("Lukas");
      expect(second?.salutation).toBe("Mr.");
      expect(second?.dateOfBirth).toBe("14.03.1986");
      expect(child).toEqual({
        kind: "child",
        firstName: "Emma",
        lastName: "TestFamily100000",
        email: "",
        dateOfBirth: "02.09.2018",
        nationality: "Switzerland",
        nightsInApartment: 7,
      });
    });

    it("shares one surname across the family", () => {
      const { factory } = factoryWith(0.99);
      const surnames = factory.family("standard").map((p) => p.lastName);

      expect(surnames).toEqual([
        "TestFamily991000",
        "TestFamily991000",
        "TestFamily991000",
      ]);
    });
  });
});
