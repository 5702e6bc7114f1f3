// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/application/model`
 * Purpose: Data entered into the four application steps and the outcome of a run.
 * Scope: Pure domain types. Does not handle I/O or DOM access.
 * Invariants: Dates are strings in dd.mm.yyyy as the target form expects; counts are whole numbers.
 * Side-effects: none
 * Notes: Optional fields are skipped by the page objects; booleans drive yes/no radios.
 * Links: src/core/application/factories.ts, src/pages/**
 * @public
 */

export type ApplicationStatus = "pending" | "submitted" | "error";

/** Details parsed from one listing row. */
export interface ApartmentDetails {
  rooms?: string;
  price?: string;
  size?: string;
  status?: string;
  fullText: string;
  apartmentId?: string;
}

export interface ParkingRequirements {
  wantsParking: boolean;
  regularSpaces: number;
  smallSpaces: number;
  largeSpaces: number;
  electricSpaces: number;
  electricSmallSpaces: number;
  outdoorSpaces: number;
  specialSpaces: number;
  reason?: string;
}

export type SecurityDepositType = "deposit" | "insurance";

/** Step 2. Every field may be left blank. */
export interface HouseholdData {
  householdType?: string;
  hasPets?: boolean;
  petsType?: string;
  hasMusicInstruments?: boolean;
  musicInstrumentsType?: string;
  isSmoker?: boolean;

  relocationReason?: string;
  desiredMoveDate?: string;
  mailboxLabel?: string;

  securityDepositType?: SecurityDepositType;
  incomeRentRatio?: boolean;
  iban?: string;
  bankName?: string;
  accountOwner?: string;

  motivation?: string;
  participationIdeas?: string;
  relationToCooperative?: string;
  relationType?: string;

  objectFoundOn?: string;
  remarks?: string;
}

/** Step 1, with the household answers carried along for step 2. */
export interface RequirementsData {
  parking: ParkingRequirements;
  household: HouseholdData;
  wantsCarSharing: boolean;
  wantsMotorbikeParking: boolean;
  motorbikeSpaces: number;
  wantsBikeParking: boolean;
  bikeSpaces: number;
  electricBikeSpaces: number;
  wantsAdditionalRoom: boolean;
  additionalRoomPurpose?: string;
  additionalRoomArea?: string;
  wantsStorageRoom: boolean;
  storageRoomPurpose?: string;
  storageRoomArea?: string;
  wantsWorkshop: boolean;
  workshopPurpose?: string;
  wantsCoworking: boolean;
  wantsHomeOffice: boolean;
  homeOfficeReason?: string;
  needsObstacleFree: boolean;
}

export type PersonKind = "adult" | "child";

export type CreditCheckType =
  | "CreditTrust certificate"
  | "Excerpt from debt collection";

/** Step 3. Children only use names, birth date, nationality and nights. */
export interface PersonData {
  kind: PersonKind;
  firstName: string;
  lastName: string;
  email: string;
  salutation?: string;
  dateOfBirth?: string;
  placeOfBirth?: string;
  civilStatus?: string;
  nationality?: string;
  residencyStatus?: string;
  livingInCountrySince?: string;
  typeOfTenant?: string;

  phoneNumber?: string;
  businessPhone?: string;

  streetAndNumber?: string;
  postCode?: string;
  city?: string;
  country?: string;
  moveInDate?: string;
  civilLawResidence?: boolean;
  relocationLast3Years?: boolean;
  communityMember?: boolean;

  employmentStatus?: string;
  creditCheckType?: CreditCheckType;
  personalLiabilityInsurance?: boolean;
  householdInsurance?: boolean;

  nightsInApartment?: number;
}

export type FamilyKind = "smoke" | "standard";

export interface RunResult {
  success: boolean;
  status: ApplicationStatus;
  errorMessage?: string;
  screenshotPaths: string[];
  apartmentDetails?: ApartmentDetails;
  durationMs?: number;
}

export function emptyParking(): ParkingRequirements {
  return {
    wantsParking: false,
    regularSpaces: 0,
    smallSpaces: 0,
    largeSpaces: 0,
    electricSpaces: 0,
    electricSmallSpaces: 0,
    outdoorSpaces: 0,
    specialSpaces: 0,
  };
}

export function emptyRequirements(
  household: HouseholdData = {}
): RequirementsData {
  return {
    parking: emptyParking(),
    household,
    wantsCarSharing: false,
    wantsMotorbikeParking: false,
    motorbikeSpaces: 0,
    wantsBikeParking: false,
    bikeSpaces: 0,
    electricBikeSpaces: 0,
    wantsAdditionalRoom: false,
    wantsStorageRoom: false,
    wantsWorkshop: false,
    wantsCoworking: false,
    wantsHomeOffice: false,
    needsObstacleFree: false,
  };
}

export function fullName(person: Pick<PersonData, "firstName" | "lastName">): string {
  return `${person.firstName} ${person.lastName}`;
}
