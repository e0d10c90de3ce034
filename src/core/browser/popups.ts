/**
 * Deterministic popup dismissal: ordered candidates, first visible wins
 */

import { BROWSER_CONSTANTS } from "../constants";
import type { Logger } from "../utils/logger";
import { errorMeta } from "../utils/logger";

export const POPUP_SELECTORS = {
  close: [
    'button[aria-label="Close"]',
    '[aria-label="Close"]',
    "button.close",
    'button[class*="close"]',
    '[class*="modal"] button[class*="close"]',
    'button:has-text("×")',
    '[role="dialog"] button',
  ],
  location: [
    'button:has-text("Never allow")',
    'button:has-text("Allow this time")',
    'button:has-text("Block")',
    'button:has-text("Not now")',
  ],
  cookie: ['button:has-text("Accept all")', 'button:has-text("Accept")', "#accept-cookies"],
} as const;

interface PopupLocator {
  isVisible(): Promise<boolean>;
  click(options: { force: boolean; timeout: number }): Promise<void>;
}

/** The slice of a playwright Page that popup handling touches */
export interface PopupPage {
  locator(selector: string): { first(): PopupLocator };
  mouse: { wheel(deltaX: number, deltaY: number): Promise<void> };
  waitForTimeout(timeout: number): Promise<void>;
  evaluate(expression: string): Promise<unknown>;
}

/** Clicks the first visible match; the selector clicked, or null */
export async function clickFirstVisible(
  page: PopupPage,
  selectors: readonly string[],
  logger: Logger,
): Promise<string | null> {
  for (const selector of selectors) {
    const candidate = page.locator(selector).first();
    if (!(await candidate.isVisible())) continue;
    try {
      await candidate.click({ force: true, timeout: BROWSER_CONSTANTS.CLICK_TIMEOUT_MS });
      return selector;
    } catch (error) {
      logger.debug(errorMeta(error, { selector }), "Popup candidate not clickable");
    }
  }
  return null;
}

/** Residual overlays go away with an incidental scroll and a body click */
export async function clearOverlays(page: PopupPage): Promise<void> {
  await page.mouse.wheel(0, 300);
  await page.waitForTimeout(500);
  await page.mouse.wheel(0, -300);
  await page.waitForTimeout(500);
  await page.evaluate("document.body && document.body.click()");
}

/**
 * Close buttons first, then location prompts, then cookie banners; overlays
 * are cleared last on every call. Returns the selectors that were clicked.
 */
export async function dismissPopups(page: PopupPage, logger: Logger): Promise<string[]> {
  const dismissed: string[] = [];
  const closed =
    (await clickFirstVisible(page, POPUP_SELECTORS.close, logger)) ??
    (await clickFirstVisible(page, POPUP_SELECTORS.location, logger));
  if (closed) dismissed.push(closed);
  const cookie = await clickFirstVisible(page, POPUP_SELECTORS.cookie, logger);
  if (cookie) dismissed.push(cookie);
  await clearOverlays(page);
  if (dismissed.length > 0) logger.info({ dismissed }, "Dismissed popups");
  return dismissed;
}
