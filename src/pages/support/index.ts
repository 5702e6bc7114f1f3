// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/support`
 * Purpose: Interaction support shared by page objects.
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export {
  ElementInteractor,
  type FillOptions,
  type LocatorRoot,
} from "./element-interactor";
export { FormControls } from "./form-controls";
export { makePageDeps, type PageDeps } from "./page-deps";
export { ScreenshotManager } from "./screenshot-manager";
