// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages`
 * Purpose: Page objects for the rental site and its admin panel.
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export { AdminApplicationsPage } from "./admin-applications.page";
export {
  type AdminCredentials,
  AdminLoginPage,
  type LoginPageState,
} from "./admin-login.page";
export { ApartmentListingPage } from "./apartment-listing.page";
export { ApplicationFormPage, type ApplicationUrls } from "./application-form.page";
export { WishlistComponent } from "./components/wishlist.component";
export { HouseholdFormPage } from "./household-form.page";
export { PeopleFormPage } from "./people-form.page";
export { SummaryFormPage, type SummaryPageState } from "./summary-form.page";
export {
  ElementInteractor,
  FormControls,
  makePageDeps,
  type PageDeps,
  ScreenshotManager,
} from "./support";
