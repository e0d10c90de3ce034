/**
 * Arriving at the store through a search engine results page
 */

import type { Page } from "playwright";
import { InterruptedError } from "../errors";
import { hostOf } from "../utils/url";
import type { Logger } from "../utils/logger";
import { errorMeta } from "../utils/logger";
import { detectCaptchaInHtml } from "./captcha";
import { humanDelay, randomMouseMove, typeLikeHuman, type HumanOptions } from "./human";
import { clickFirstVisible } from "./popups";

export const SEARCH_BOX_SELECTORS = [
  'textarea[name="q"]',
  'input[name="q"]',
  'textarea[title="Search"]',
  'input[title="Search"]',
];

export const ENGINE_CONSENT_SELECTORS = [
  'button:has-text("Not now")',
  'button:has-text("No thanks")',
  'button:has-text("Accept all")',
  'button:has-text("I agree")',
  "#L2AGLb",
];

/** Organic results live in #search/#rso; the last entry is a loose fallback */
export function organicResultSelectors(targetHost: string): string[] {
  return [
    `#rso a[href*="${targetHost}"]:not([data-rw])`,
    `#search a[href*="${targetHost}"]:not([data-rw])`,
    `a[href*="${targetHost}"]`,
  ];
}

export function isSponsoredHref(href: string): boolean {
  return /\/aclk\?|googleadservices|[?&]adurl=/i.test(href);
}

export interface SearchRouteOptions extends HumanOptions {
  engineUrl: string;
  timeoutMs: number;
  logger: Logger;
}

async function findSearchBox(page: Page): Promise<string | null> {
  for (const selector of SEARCH_BOX_SELECTORS) {
    if (await page.locator(selector).first().isVisible()) return selector;
  }
  return null;
}

async function clickOrganicResult(page: Page, targetHost: string, opts: SearchRouteOptions): Promise<boolean> {
  for (const selector of organicResultSelectors(targetHost)) {
    for (const link of await page.locator(selector).all()) {
      const href = await link.getAttribute("href");
      if (!href || isSponsoredHref(href)) continue;
      const context = await link.evaluate(
        "el => { const d = el.closest('div'); return d ? d.textContent || '' : ''; }",
      );
      if (typeof context === "string" && /sponsored/i.test(context)) continue;

      opts.logger.info({ href: href.slice(0, 100) }, "Clicking organic result");
      await link.scrollIntoViewIfNeeded();
      await humanDelay(opts, 500, 1_000);
      await randomMouseMove(page, opts);
      await link.click();
      await page.waitForLoadState("domcontentloaded", { timeout: opts.timeoutMs });
      return true;
    }
  }
  return false;
}

/**
 * Searches the engine for `query` and clicks the first organic result on
 * `targetHost`. False (never a throw) when the route fails or a challenge
 * appears, so the caller can navigate directly instead.
 */
export async function routeViaSearchEngine(
  page: Page,
  query: string,
  targetHost: string,
  opts: SearchRouteOptions,
): Promise<boolean> {
  const { logger } = opts;
  try {
    await page.goto(opts.engineUrl, { waitUntil: "domcontentloaded", timeout: opts.timeoutMs });
    if (detectCaptchaInHtml(await page.content())) {
      logger.warn("Search engine challenge on landing, navigating directly");
      return false;
    }
    await humanDelay(opts, 1_500, 3_000);
    await randomMouseMove(page, opts);
    await clickFirstVisible(page, ENGINE_CONSENT_SELECTORS, logger);

    const box = await findSearchBox(page);
    if (!box) {
      logger.warn("Search box not found, navigating directly");
      return false;
    }
    await typeLikeHuman(page, box, query, opts);
    await page.keyboard.press("Enter");
    await page.waitForLoadState("domcontentloaded", { timeout: opts.timeoutMs });
    if (detectCaptchaInHtml(await page.content())) {
      logger.warn("Search engine challenge on results, navigating directly");
      return false;
    }
    await humanDelay(opts, 1_500, 2_500);
    await clickFirstVisible(page, ENGINE_CONSENT_SELECTORS, logger);

    if (!(await clickOrganicResult(page, targetHost, opts))) {
      logger.warn({ targetHost }, "No organic result for the store, navigating directly");
      return false;
    }
    const landed = hostOf(page.url());
    return landed != null && landed.endsWith(targetHost.replace(/^www\./, ""));
  } catch (error) {
    if (error instanceof InterruptedError) throw error;
    logger.warn(errorMeta(error, { targetHost }), "Search engine routing failed, navigating directly");
    return false;
  }
}
