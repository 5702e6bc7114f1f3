// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@pages/admin-login`
 * Purpose: Page object for the admin panel login.
 * Scope: Opens the admin URL, checks the login form, signs in and confirms the dashboard. Credentials are supplied by the caller.
 * Invariants:
 * - The login form counts as loaded when at least two login indicators are present.
 * - A visible login error after submit raises ApplicationFormError; no indicator and no error is treated as success.
 * Side-effects: IO (browser, screenshots)
 * Links: src/shared/env/suite.ts (ADMIN_USERNAME, ADMIN_PASSWORD)
 * @public
 */

import type { Page } from "@playwright/test";

import { ADMIN, ApplicationFormError, describeError } from "@/shared";

import { ElementInteractor, type PageDeps } from "./support";

export interface AdminCredentials {
  username: string;
  password: string;
}

export interface LoginPageState {
  url: string;
  title: string;
  textInputs: number;
  passwordInputs: number;
  buttons: number;
}

const MIN_LOGIN_INDICATORS = 2;

export class AdminLoginPage {
  private readonly interactor: ElementInteractor;

  constructor(
    private readonly page: Page,
    private readonly deps: PageDeps,
    private readonly adminUrl: string,
    private readonly credentials: AdminCredentials
  ) {
    this.interactor = new ElementInteractor(page, deps.log, deps.timings);
  }

  async navigateToAdminLogin(): Promise<void> {
    try {
      await this.page.goto(this.adminUrl);
      await this.page.waitForLoadState("networkidle", {
        timeout: this.deps.timings.networkIdleTimeoutMs,
      });
      await this.deps.screenshots.capture(this.page, "09_admin_login_page", true);
      this.deps.log.info({ url: this.adminUrl }, "admin login page loaded");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "admin_login_navigation");
      throw new ApplicationFormError(
        `Error navigating to admin login: ${describeError(error)}`,
        error
      );
    }
  }

  async verifyLoginPageLoaded(): Promise<boolean> {
    try {
      await this.page
        .locator(ADMIN.usernameInput)
        .first()
        .waitFor({ state: "attached", timeout: this.deps.timings.defaultTimeoutMs });

      let found = 0;
      for (const selector of ADMIN.loginIndicators) {
        if ((await this.page.locator(selector).count()) > 0) found++;
      }
      this.deps.log.info({ found }, "login indicators");
      return found >= MIN_LOGIN_INDICATORS;
    } catch (error) {
      this.deps.log.error({ reason: describeError(error) }, "could not verify login page");
      return false;
    }
  }

  async loginToAdminPanel(): Promise<void> {
    try {
      if (!(await this.verifyLoginPageLoaded())) {
        await this.debugCurrentPage();
        throw new ApplicationFormError("Admin login page did not load correctly");
      }
      await this.fillCredentials();
      await this.submitLogin();
      await this.verifyLoginSuccess();

      await this.deps.screenshots.capture(this.page, "10_admin_dashboard", true);
      this.deps.log.info("logged into admin panel");
    } catch (error) {
      await this.deps.screenshots.captureError(this.page, "admin_login");
      throw new ApplicationFormError(
        `Error logging into admin panel: ${describeError(error)}`,
        error
      );
    }
  }

  async debugCurrentPage(): Promise<LoginPageState> {
    const state: LoginPageState = {
      url: this.page.url(),
      title: await this.page.title(),
      textInputs: await this.page.locator("input[type='text']").count(),
      passwordInputs: await this.page.locator("input[type='password']").count(),
      buttons: await this.page.locator("button").count(),
    };
    this.deps.log.info({ state }, "admin login page state");
    await this.deps.screenshots.captureError(this.page, "admin_login_debug");
    return state;
  }

  private async fillCredentials(): Promise<void> {
    await this.page.locator(ADMIN.usernameInput).fill(this.credentials.username);
    await this.page.locator(ADMIN.passwordInput).fill(this.credentials.password);
    this.deps.log.info("credentials filled");
  }

  private async submitLogin(): Promise<void> {
    let clicked = false;
    for (const selector of ADMIN.loginButtons) {
      const button = this.page.locator(selector).first();
      if ((await button.count()) > 0) {
        await button.click();
        clicked = true;
        break;
      }
    }

    if (!clicked) {
      const password = this.page.locator(ADMIN.passwordInput);
      if ((await password.count()) === 0) {
        throw new ApplicationFormError("No login button or password field found for submission");
      }
      await password.press("Enter");
    }
    await this.interactor.settle();
  }

  private async verifyLoginSuccess(): Promise<void> {
    try {
      await this.page.waitForURL((url) => !url.pathname.includes("/login"), {
        timeout: this.deps.timings.slowTimeoutMs,
      });
      this.deps.log.info({ url: this.page.url() }, "redirected away from login");
      return;
    } catch {
      this.deps.log.info({ url: this.page.url() }, "still on login url");
    }

    const indicator = await this.interactor.waitForVisible(
      ADMIN.dashboardIndicators,
      this.deps.timings.defaultTimeoutMs
    );
    if (indicator !== undefined) return;

    const loginError = await this.interactor.firstVisible(ADMIN.loginErrors);
    if (loginError !== undefined) {
      const message = ((await loginError.textContent()) ?? "").trim();
      throw new ApplicationFormError(`Login failed with error: ${message}`);
    }
    this.deps.log.warn("no dashboard indicator and no login error, assuming success");
  }
}
