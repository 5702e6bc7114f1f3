// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/application/factories`
 * Purpose: Generates applicant data for the application steps: realistic random mixes and fixed scenarios.
 * Scope: Builds RequirementsData, HouseholdData and families of PersonData from an injected Rng. Does not touch the browser.
 * Invariants:
 * - All randomness flows through the Rng port; identical rng sequences yield identical data.
 * - Dates are formatted dd.mm.yyyy relative to the injected `today`.
 * - A family's members share one generated surname; emails are unique per generated surname.
 * Side-effects: none
 * Notes: Catalog strings live in catalog.json; probabilities in @/shared/config.
 * Links: src/core/application/model.ts, tests/unit/core/application/factories.test.ts
 * @public
 */

import type { Rng } from "@/ports";
import {
  HOUSEHOLD_PROBABILITIES,
  REQUIREMENT_PROBABILITIES,
} from "@/shared/config";

import catalog from "./catalog.json";
import {
  emptyParking,
  emptyRequirements,
  type FamilyKind,
  type HouseholdData,
  type ParkingRequirements,
  type PersonData,
  type RequirementsData,
} from "./model";
import { chance, intBetween, pick } from "./random";

export interface FactoryOptions {
  /** Reference day for generated dates. */
  today?: Date;
}

export interface RequirementsFactory {
  realisticApplicant(): RequirementsData;
  realisticHousehold(): HouseholdData;
  minimalApplicant(): RequirementsData;
  maximalistApplicant(): RequirementsData;
  invalidApplicant(): RequirementsData;
  family(kind: FamilyKind): PersonData[];
}

const PARKING_KINDS = [
  "regularSpaces",
  "smallSpaces",
  "largeSpaces",
  "electricSpaces",
  "outdoorSpaces",
] as const satisfies readonly (keyof ParkingRequirements)[];

export function formatSwissDate(date: Date): string {
  const dd = String(date.getDate()).padStart(2, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  return `${dd}.${mm}.${date.getFullYear()}`;
}

/** First day of the month `months` after `today`. */
export function firstOfMonthAfter(today: Date, months: number): string {
  return formatSwissDate(
    new Date(today.getFullYear(), today.getMonth() + months, 1)
  );
}

function yearsBefore(today: Date, years: number, month: number, day: number): string {
  return formatSwissDate(new Date(today.getFullYear() - years, month - 1, day));
}

export function createRequirementsFactory(
  rng: Rng,
  options: FactoryOptions = {}
): RequirementsFactory {
  const today = options.today ?? new Date();
  const p = REQUIREMENT_PROBABILITIES;
  const h = HOUSEHOLD_PROBABILITIES;

  function realisticParking(): ParkingRequirements {
    const parking = emptyParking();
    if (!chance(rng, p.parking)) return parking;

    parking.wantsParking = true;
    for (const kind of PARKING_KINDS) {
      if (chance(rng, p.parkingKind)) {
        parking[kind] = intBetween(rng, 1, 2);
      }
    }
    if (chance(rng, p.parkingReason)) {
      parking.reason = pick(rng, catalog.parkingReasons);
    }
    return parking;
  }

  function realisticHousehold(): HouseholdData {
    const household: HouseholdData = {
      householdType: "couple household with child",
      hasPets: chance(rng, h.pets),
      hasMusicInstruments: chance(rng, h.musicInstruments),
      isSmoker: chance(rng, h.smoker),
      relocationReason: pick(rng, catalog.relocationReasons),
    };

    if (chance(rng, h.moveDate)) {
      household.desiredMoveDate = firstOfMonthAfter(today, 3);
    }
    if (chance(rng, h.mailboxLabel)) {
      household.mailboxLabel = "Muster Family";
    }
    household.securityDepositType = chance(rng, h.deposit)
      ? "deposit"
      : "insurance";
    household.incomeRentRatio = chance(rng, h.incomeRentRatio);
    if (chance(rng, h.bankDetails)) household.iban = "CH00 0000 0000 0000 0000 0";
    if (chance(rng, h.bankDetails)) household.bankName = "Test Bank";
    if (chance(rng, h.bankDetails)) household.accountOwner = "Anna Muster";

    household.motivation = "Looking for a community-oriented living space";
    if (chance(rng, h.participationIdeas)) {
      household.participationIdeas = "Interested in community garden and events";
    }
    if (chance(rng, h.cooperativeRelation)) {
      household.relationToCooperative = pick(rng, catalog.cooperativeRelations);
    }

    household.objectFoundOn = pick(rng, catalog.objectSources);
    if (chance(rng, h.remarks)) {
      household.remarks = "Excited to be part of the community!";
    }
    return household;
  }

  function realisticApplicant(): RequirementsData {
    const data = emptyRequirements();
    data.parking = realisticParking();
    data.household = realisticHousehold();

    data.wantsCarSharing = chance(rng, p.carSharing);

    if (chance(rng, p.motorbike)) {
      data.wantsMotorbikeParking = true;
      data.motorbikeSpaces = 1;
    }

    if (chance(rng, p.bike)) {
      data.wantsBikeParking = true;
      data.bikeSpaces = intBetween(rng, 1, 3);
      if (chance(rng, p.electricBike)) {
        data.electricBikeSpaces = intBetween(rng, 1, 2);
      }
    }

    if (chance(rng, p.additionalRoom)) {
      data.wantsAdditionalRoom = true;
      data.additionalRoomPurpose = pick(rng, catalog.roomPurposes);
      data.additionalRoomArea = pick(rng, catalog.roomAreas);
    }

    if (chance(rng, p.storageRoom)) {
      data.wantsStorageRoom = true;
      data.storageRoomPurpose = pick(rng, catalog.storagePurposes);
      data.storageRoomArea = pick(rng, catalog.storageAreas);
    }

    if (chance(rng, p.workshop)) {
      data.wantsWorkshop = true;
      data.workshopPurpose = pick(rng, catalog.workshopPurposes);
    }

    data.wantsCoworking = chance(rng, p.coworking);

    if (chance(rng, p.homeOffice)) {
      data.wantsHomeOffice = true;
      data.homeOfficeReason = pick(rng, catalog.homeOfficeReasons);
    }

    data.needsObstacleFree = chance(rng, p.accessibility);
    return data;
  }

  function minimalApplicant(): RequirementsData {
    return emptyRequirements();
  }

  function maximalistApplicant(): RequirementsData {
    return {
      parking: {
        wantsParking: true,
        regularSpaces: 2,
        smallSpaces: 1,
        largeSpaces: 1,
        electricSpaces: 1,
        electricSmallSpaces: 1,
        outdoorSpaces: 1,
        specialSpaces: 1,
        reason: "Business use and family transportation needs",
      },
      household: {
        householdType: "couple household with child",
        hasPets: true,
        petsType: "Cat",
        hasMusicInstruments: true,
        musicInstrumentsType: "Piano",
        isSmoker: false,
        relocationReason: "Change in space requirements",
        desiredMoveDate: firstOfMonthAfter(today, 3),
        mailboxLabel: "Muster Family",
        securityDepositType: "deposit",
        incomeRentRatio: true,
        iban: "CH00 0000 0000 0000 0000 0",
        bankName: "Test Bank",
        accountOwner: "Anna Muster",
        motivation: "Looking for a community-oriented living space",
        participationIdeas: "Interested in community garden and events",
        relationToCooperative: "Voluntary member",
        relationType: "Workplace in the neighborhood",
        objectFoundOn: "Project website",
        remarks: "Excited to be part of the community!",
      },
      wantsCarSharing: true,
      wantsMotorbikeParking: true,
      motorbikeSpaces: 1,
      wantsBikeParking: true,
      bikeSpaces: 2,
      electricBikeSpaces: 1,
      wantsAdditionalRoom: true,
      additionalRoomPurpose:
        "Multi-purpose room for home office and guest accommodation",
      additionalRoomArea: "15-25 m²",
      wantsStorageRoom: true,
      storageRoomPurpose:
        "Storage for seasonal items, sports equipment, and household goods",
      storageRoomArea: "5-10 m²",
      wantsWorkshop: true,
      workshopPurpose: "Creative studio for art, crafts, and DIY projects",
      wantsCoworking: true,
      wantsHomeOffice: true,
      homeOfficeReason:
        "Full-time remote work arrangement with video conferencing needs",
      needsObstacleFree: true,
    };
  }

  // For validation checks: the form should reject both values.
  function invalidApplicant(): RequirementsData {
    const data = emptyRequirements();
    data.parking = {
      ...emptyParking(),
      wantsParking: true,
      regularSpaces: -5,
      reason: "x".repeat(1000),
    };
    return data;
  }

  function adult(
    firstName: string,
    surname: string,
    salutation: string,
    birthYearsAgo: number
  ): PersonData {
    const address = pick(rng, catalog.cities);
    return {
      kind: "adult",
      salutation,
      firstName,
      lastName: surname,
      email: `${firstName}.${surname}@${catalog.emailDomain}`.toLowerCase(),
      dateOfBirth: yearsBefore(today, birthYearsAgo, 3, 14),
      placeOfBirth: address.city,
      civilStatus: "Married",
      nationality: "Switzerland",
      residencyStatus: "Swiss citizen",
      typeOfTenant: "Tenant",
      phoneNumber: "079 123 45 67",
      streetAndNumber: address.street,
      postCode: address.postCode,
      city: address.city,
      country: "Switzerland",
      moveInDate: yearsBefore(today, 5, 4, 1),
      civilLawResidence: true,
      relocationLast3Years: false,
      communityMember: false,
      employmentStatus: "Full-time",
      creditCheckType: "CreditTrust certificate",
      personalLiabilityInsurance: true,
      householdInsurance: true,
    };
  }

  function family(kind: FamilyKind): PersonData[] {
    const surname = `${catalog.familySurnamePrefix}${intBetween(rng, 100000, 999999)}`;
    const first = adult(pick(rng, catalog.adultFirstNames), surname, "Ms.", 38);
    if (kind === "smoke") return [first];

    const remaining = catalog.adultFirstNames.filter((n) => n !== first.firstName);
    const second = adult(pick(rng, remaining), surname, "Mr.", 40);
    const child: PersonData = {
      kind: "child",
      firstName: pick(rng, catalog.childFirstNames),
      lastName: surname,
      email: "",
      dateOfBirth: yearsBefore(today, 8, 9, 2),
      nationality: "Switzerland",
      nightsInApartment: 7,
    };
    return [first, second, child];
  }

  return {
    realisticApplicant,
    realisticHousehold,
    minimalApplicant,
    maximalistApplicant,
    invalidApplicant,
    family,
  };
}
