// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/selectors`
 * Purpose: Selector fallback chains for the target rental site, grouped by component.
 * Scope: Constants and small selector builders. Does not query the DOM.
 * Invariants: Chains are ordered most-specific first; callers stop at the first chain entry that yields a visible element.
 * Side-effects: none
 * Notes: These mirror the target site's current markup and are expected to drift; keep page objects free of literals where a chain exists here.
 * Links: src/pages/**
 * @public
 */

export const LISTING = {
  apartmentRows: [
    "tr[data-apartment-id]",
    "tr:has(td:has-text('Available'))",
    "tr:has(.bewerben)",
    "tr:has(span.bewerben)",
    "table tr:not(:first-child)",
    ".apartment-row",
    "tr:has(td):not(.header-row)",
  ],
  rowWishlistButton: "span.bewerben",
} as const;

export const WISHLIST = {
  panel: [
    ".apartments-table-wishlist",
    "div[class*='apartments-table-wishlist']",
    "div[class*='wishlist']",
  ],
  applyButtons: [
    ".button:has-text('Apply')",
    "div.button:has-text('Apply')",
    "button:has-text('Apply')",
    "*[class*='button']:has-text('Apply')",
  ],
} as const;

export const FORM = {
  container: ".application-form",
  submitButton: "#application-btn-submit",
  indicators: [
    ".application-form",
    "form",
    "input[type='text']",
    "textarea",
    "select",
    ".af-steps",
  ],
  directNavigationMarker: ".application-form, form, input",
  fields: "input, textarea, select",
  startButtons: [
    "#start-application-btn",
    "button:has-text('Start')",
    ".start-btn",
    "input[type='submit']",
    ".begin-application",
  ],
  errorMessages: [
    ".error-message",
    ".validation-error",
    ".field-error",
    "[class*='error']",
  ],
  successIndicators: [
    "#apartment_household .af-position.active",
    "[class*='success']",
    ".step-completed",
  ],
  activeStep: (stepId: string): string => `#${stepId} .af-position.active`,
  radio: (optionId: string): string => `li#${optionId}`,
  counterInput: (fieldId: string): string => `input#${fieldId}`,
  counterIncrement: (fieldId: string): string => `#increment-${fieldId}`,
  counterDecrement: (fieldId: string): string => `#decrement-${fieldId}`,
  dropdownToggle: (fieldId: string): string => `#toggle-${fieldId}`,
} as const;

export const STEPS = {
  requirements: "apartment_requirements",
  household: "apartment_household",
  people: "apartment_people",
  agreement: "apartment_agreement",
} as const;

export const REQUIREMENTS = {
  parkingReason: "input#field-car_reason",
  additionalRoomUse: "textarea#field-addroom_intended_use",
  additionalRoomArea: "input#field-addroom_area",
  storageRoomUse: "textarea#field-stockroom_intended_use",
  storageRoomArea: "input#field-stockroom_area",
  workshopUse: "textarea#field-workshop_intended_use",
  homeOfficeDetail: "input#field-wants_homeoffice_detail",
} as const;

export const HOUSEHOLD = {
  dropdownItems: "ul.select-dropdown-items-wrapper li",
  itemByValue: (dataValue: string): string => `li[data-value="${dataValue}"]`,
  textItems: "li.dropdown-item",
  /** Toggle of each custom dropdown, keyed like dropdown-values.json. */
  toggles: {
    householdType: "#toggle-field-household_type",
    relocationReason: "#toggle-field-relocation_reason",
    cooperativeRelation: "#toggle-field-relation_to_project",
    relationType: "#toggle-field-relation_to_project_detail",
    objectSource: "#toggle-field-source",
  },
  petsType: "input#field-pets_type",
  musicInstrumentsType: "input#field-music_instruments_type",
  movingDate: "input#field-moving_date",
  mailboxLabel: "input#field-mailbox_label",
  iban: "input#field-iban",
  bankName: "input#field-bank_name",
  accountOwner: "input#field-account_owner",
  motivation: "textarea#field-motivation",
  participation: "textarea#field-participation",
  remarks: "textarea#field-remarks",
} as const;

export const PEOPLE = {
  addAdult: "#create-new-adult",
  addChild: [
    "#create-new-child",
    "text=Add child",
    ".create-child",
    "[class*='add-child']",
  ],
  childFormMarker: "input[placeholder='Please specify']",
  nightsPresent: "field-days_present",
  saveButton: "#submit-nested-form",
  saveFallbacks: [
    ".btn.btn-primary:has-text('Save')",
    ".btn:has-text('Save')",
  ],
  continueButtons: [
    "#application-btn-next",
    ".btn:has-text('Continue')",
    ".btn:has-text('Next')",
    ".btn.btn-next",
    "button:has-text('Continue')",
    "button:has-text('Next')",
    ".navigation-buttons .btn:not(.btn-previous)",
  ],
  submitButtons: [
    "button:has-text('Submit')",
    "button:has-text('Continue')",
    "button:has-text('Next')",
    ".btn:has-text('Submit')",
    ".btn:has-text('Continue')",
    ".btn:has-text('Next')",
    "#application-btn-submit",
  ],
  firstName: "#field-firstname",
  lastName: "#field-name",
  dateOfBirth: "#field-date_of_birth",
  placeOfBirth: "#field-place_of_birth",
  placeOfCitizenship: "#field-place_of_citizenship",
  livingInCountrySince: "#field-living_in_country_since",
  phone: "#field-phone",
  officePhone: "#field-office_phone",
  email: "#field-email",
  emailConfirm: "#confirm-field-email",
  street: "#field-street_nr",
  postcode: "#field-postcode",
  city: "#field-city",
  livingSince: "#field-living_since",
  creditCertificate: "#securities-certificat",
  creditEnforcement: "#securities-enforcement",
  agreementReferences: "field-agreement_references",
  dropdowns: {
    salutation: "field-title",
    civilStatus: "field-civil_status",
    nationality: "field-nation",
    residencyStatus: "field-permit",
    tenantType: "field-tenant_type",
    country: "field-country",
    employment: "field-employment_quota",
  },
  dropdownOption: (value: string): string[] => [
    `li.dropdown-item[data-value='${value}']`,
    `li.dropdown-item:has-text('${value}')`,
    `li:has-text('${value}')`,
    `[title='${value}']`,
    `.option:has-text('${value}')`,
    `text=${value}`,
  ],
  yesNo: (questionId: string, yes: boolean): string =>
    `#${questionId}-${yes ? "true" : "false"}`,
} as const;

export const SUMMARY = {
  indicators: [
    "#field-agreement_penalty",
    "#field-agreement_truth",
    "#field-agreement_privacy",
    "h3:has-text('Summary')",
    ".section-info-label:has-text('Summary')",
  ],
  agreements: [
    { id: "field-agreement_penalty", description: "Compensation fee agreement" },
    { id: "field-agreement_truth", description: "Truthful answers confirmation" },
    { id: "field-agreement_privacy", description: "Privacy policy agreement" },
  ],
  submitButton: "#application-btn-submit",
} as const;

export const ADMIN = {
  usernameInput: "input[type='text'][required]",
  passwordInput: "input[type='password'][required]",
  loginIndicators: [
    "span:has-text('Username')",
    "span:has-text('Password')",
    "input[type='text'][required]",
    "input[type='password'][required]",
  ],
  loginButtons: [
    "button[type='submit']",
    "input[type='submit']",
    "button:has-text('Login')",
    "button:has-text('Anmelden')",
    "button:has-text('Sign in')",
    ".login-button",
    ".btn-login",
  ],
  dashboardIndicators: [
    "text=Bewerbungen",
    "text=Dashboard",
    "text=Admin",
    "[class*='dashboard']",
    "[class*='admin']",
    "nav",
    ".sidebar",
    ".menu",
  ],
  loginErrors: [
    "text=Invalid",
    "text=Fehler",
    "text=Ungültig",
    "text=Falsch",
    ".error",
    ".alert-danger",
    "[class*='error']",
  ],
  navigation: [
    "a[href='/applications']",
    ".menu-item a[href='/applications']",
    "span.menu-item-label:has-text('Applications')",
    "text=Applications",
  ],
  applicationsPageIndicators: [
    "text=Bewerbungen",
    "text=Applications",
    "table",
    ".table",
    "[data-testid*='applications']",
    "th:has-text('Name')",
    "th:has-text('Email')",
    "th:has-text('Status')",
  ],
  tables: [
    "table",
    ".table",
    "[role='table']",
    ".applications-table",
    ".bewerbungen-table",
  ],
  tableContent: ["text=Bewerbungen", "text=Applications", "tr", ".content"],
  headers: "th",
  bodyRows: "tbody tr, table tr:not(:first-child)",
  allRows: "tr",
  rowCells: "td, th",
  rowActions: ["a", "button", "[data-action]", ".btn", ".link", "[onclick]"],
  detailIndicators: [
    ".modal",
    ".dialog",
    "[role='dialog']",
    "[class*='application-detail']",
    "[class*='detail']",
    ".detail-form",
    "input[type='email']",
    "label:has-text('Email')",
    "label:has-text('Move-in')",
  ],
  detailContent: [
    "text=Email",
    "text=Phone",
    "text=Address",
    "text=Move-in",
    "input",
    "textarea",
    "select",
  ],
  detailFields: [
    "input[type='text']",
    "input[type='email']",
    "input[type='tel']",
    "input[type='date']",
    "textarea",
    "select",
  ],
} as const;
