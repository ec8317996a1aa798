import { chromium, errors } from "playwright-core";
import type { Browser, BrowserContext, Locator, Page } from "playwright-core";
import type { AppConfig, SiteProfile, TimeoutSettings } from "../config";
import type { Logger } from "../observability";
import { PlaywrightDocumentRenderer } from "./playwrightRenderer";
import type { DetailSurface, ListingAutomation, ListingItem, ListingSession, SurfaceKind } from "./types";

const MEASURE_TIMEOUT_MS = 2_000;
const CLOSE_TIMEOUT_MS = 5_000;

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

class PlaywrightDetailSurface implements DetailSurface {
  readonly kind: SurfaceKind;
  private readonly page: Page;
  private readonly root: Locator;
  private readonly site: SiteProfile;

  constructor(kind: SurfaceKind, page: Page, root: Locator, site: SiteProfile) {
    this.kind = kind;
    this.page = page;
    this.root = root;
    this.site = site;
  }

  measureContent(): Promise<number> {
    return this.root
      .locator(this.site.detailContentSelector)
      .first()
      .evaluate((el) => el.scrollHeight, undefined, { timeout: MEASURE_TIMEOUT_MS });
  }

  async fitToContent(): Promise<void> {
    await this.root.evaluate((el, contentSelector) => {
      const content = el.querySelector(contentSelector);
      if (content) {
        el.style.width = `${content.scrollWidth + 40}px`;
        el.style.height = `${content.scrollHeight + 40}px`;
        el.style.overflow = "visible";
      }
    }, this.site.detailContentSelector);
  }

  snapshotHtml(): Promise<string> {
    return this.root.evaluate((el) => el.outerHTML);
  }

  async findDocumentLink(): Promise<string | undefined> {
    const link = this.root.locator(this.site.documentLinkSelector).first();
    if ((await link.count()) === 0) {
      return undefined;
    }
    return (await link.getAttribute("href")) ?? undefined;
  }

  async close(): Promise<void> {
    const selector = this.kind === "restricted" ? this.site.restrictedCloseSelector : this.site.detailCloseSelector;
    const button = this.root.locator(selector).first();
    if ((await button.count()) > 0) {
      await button.click({ timeout: CLOSE_TIMEOUT_MS });
      return;
    }
    await this.page.keyboard.press("Escape");
  }
}

class PlaywrightListingItem implements ListingItem {
  private readonly row: Locator;
  private readonly triggerSelector: string;

  constructor(row: Locator, triggerSelector: string) {
    this.row = row;
    this.triggerSelector = triggerSelector;
  }

  readRowHtml(): Promise<string> {
    return this.row.evaluate((el) => el.outerHTML);
  }

  async activateDetail(timeoutMs: number): Promise<boolean> {
    const trigger = this.row.locator(this.triggerSelector).first();
    if ((await trigger.count()) === 0) {
      return false;
    }
    await trigger.click({ timeout: timeoutMs });
    return true;
  }
}

/** Listing page driven through the site's paginator. */
export class PlaywrightListingSession implements ListingSession {
  private readonly page: Page;
  private readonly site: SiteProfile;
  private readonly timeouts: TimeoutSettings;
  private readonly logger: Logger;

  constructor(page: Page, site: SiteProfile, timeouts: TimeoutSettings, logger: Logger) {
    this.page = page;
    this.site = site;
    this.timeouts = timeouts;
    this.logger = logger;
  }

  get url(): string {
    return this.page.url();
  }

  async switchToListView(): Promise<void> {
    if (this.site.listViewButtonText) {
      const button = this.page.locator("button", { hasText: this.site.listViewButtonText }).first();
      if ((await button.count()) > 0) {
        this.logger.info("list_view_switch", { buttonText: this.site.listViewButtonText });
        await button.click({ timeout: this.timeouts.triggerMs });
      }
    }

    if (!(await this.waitForRows())) {
      this.logger.warn("listing_rows_not_detected", { rowSelector: this.site.rowSelector });
    }
  }

  async selectPage(pageNumber: number): Promise<boolean> {
    // Each click only moves within the paginator's visible window.
    for (let attempt = 0; attempt <= pageNumber; attempt += 1) {
      const current = await this.currentPage();
      if (current === pageNumber || (current === undefined && pageNumber === 1)) {
        return this.waitForRows();
      }

      const moved = await this.stepToward(pageNumber, current);
      if (!moved) {
        this.logger.warn("paginator_target_unreachable", { page: pageNumber, current });
        return false;
      }
      await this.page.waitForTimeout(this.timeouts.pageSettleMs);
    }
    return false;
  }

  async enumerateItems(): Promise<ListingItem[]> {
    await this.waitForRows();
    const rows = this.page.locator(this.site.rowSelector);
    const count = await rows.count();
    const items: ListingItem[] = [];
    for (let index = 0; index < count; index += 1) {
      items.push(new PlaywrightListingItem(rows.nth(index), this.site.detailTriggerSelector));
    }
    return items;
  }

  async detectTotalPages(): Promise<number | undefined> {
    const numbers = await this.visiblePageNumbers();
    return numbers.length > 0 ? Math.max(...numbers) : undefined;
  }

  async waitForSurface(kind: SurfaceKind, timeoutMs: number): Promise<DetailSurface | null> {
    const selector = kind === "restricted" ? this.site.restrictedSurfaceSelector : this.site.detailSurfaceSelector;
    const root = this.page.locator(selector).first();
    try {
      await root.waitFor({ state: "visible", timeout: timeoutMs });
    } catch (error) {
      if (isTimeout(error)) {
        return null;
      }
      throw error;
    }
    return new PlaywrightDetailSurface(kind, this.page, root, this.site);
  }

  private async waitForRows(): Promise<boolean> {
    try {
      await this.page
        .locator(this.site.rowSelector)
        .first()
        .waitFor({ state: "visible", timeout: this.timeouts.pageSelectMs });
      return true;
    } catch (error) {
      if (isTimeout(error)) {
        return false;
      }
      throw error;
    }
  }

  private async currentPage(): Promise<number | undefined> {
    const current = this.page.locator(this.site.paginatorCurrentSelector).first();
    if ((await current.count()) === 0) {
      return undefined;
    }
    const value = Number.parseInt((await current.innerText()).trim(), 10);
    return Number.isFinite(value) ? value : undefined;
  }

  private async visiblePageNumbers(): Promise<number[]> {
    const texts = await this.page.locator(this.site.paginatorPageSelector).allInnerTexts();
    return texts
      .map((text) => text.trim())
      .filter((text) => /^\d+$/.test(text))
      .map((text) => Number.parseInt(text, 10));
  }

  private async stepToward(target: number, current: number | undefined): Promise<boolean> {
    const candidates = (await this.visiblePageNumbers()).filter((value) => value !== current);
    if (candidates.length === 0) {
      return this.clickNext(target, current);
    }

    const closest = candidates.reduce((best, value) =>
      Math.abs(value - target) < Math.abs(best - target) ? value : best,
    );
    if (current !== undefined && Math.abs(closest - target) >= Math.abs(current - target)) {
      return this.clickNext(target, current);
    }

    await this.page
      .locator(this.site.paginatorPageSelector)
      .filter({ hasText: new RegExp(`^\\s*${closest}\\s*$`) })
      .first()
      .click({ timeout: this.timeouts.pageSelectMs });
    return true;
  }

  private async clickNext(target: number, current: number | undefined): Promise<boolean> {
    if (current === undefined || current > target) {
      return false;
    }
    const next = this.page.locator(this.site.paginatorNextSelector).first();
    if ((await next.count()) === 0 || !(await next.isEnabled())) {
      return false;
    }
    await next.click({ timeout: this.timeouts.pageSelectMs });
    return true;
  }
}

/** One Chromium browser and context shared by the listing page and every snapshot page. */
export class PlaywrightAutomation implements ListingAutomation {
  readonly renderer: PlaywrightDocumentRenderer;
  private readonly browser: Browser;
  private readonly context: BrowserContext;
  private readonly config: AppConfig;
  private readonly logger: Logger;

  constructor(browser: Browser, context: BrowserContext, config: AppConfig, logger: Logger) {
    this.browser = browser;
    this.context = context;
    this.config = config;
    this.logger = logger;
    this.renderer = new PlaywrightDocumentRenderer(context, {
      contentSelector: config.site.snapshotContentSelector,
      stabilization: config.stabilization,
      loadTimeoutMs: config.timeouts.captureMs,
      logger: logger.child("renderer"),
    });
  }

  async openListing(url: string): Promise<ListingSession> {
    const page = await this.context.newPage();
    page.setDefaultTimeout(this.config.timeouts.navigationMs);
    this.logger.info("listing_open", { url });
    await page.goto(url, { waitUntil: "networkidle", timeout: this.config.timeouts.navigationMs });

    const session = new PlaywrightListingSession(page, this.config.site, this.config.timeouts, this.logger.child("listing"));
    await session.switchToListView();
    return session;
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

export async function launchListingAutomation(config: AppConfig, logger: Logger): Promise<PlaywrightAutomation> {
  const browser = await chromium.launch({
    headless: config.headless,
    executablePath: config.browserExecutablePath,
    channel: config.browserChannel,
    args: ["--no-sandbox"],
  });

  try {
    const context = await browser.newContext({ ignoreHTTPSErrors: config.ignoreHttpsErrors });
    return new PlaywrightAutomation(browser, context, config, logger.child("automation"));
  } catch (error) {
    await browser.close();
    throw error;
  }
}
