/**
 * Browser optimization utilities
 */

import type { Page } from "playwright";

/**
 * Aborts requests for the given resource types (images, fonts, media...)
 * so listing pages load faster
 */
export async function optimizePage(page: Page, blockedTypes: readonly string[]): Promise<void> {
  if (blockedTypes.length === 0) return;
  const blocked = new Set(blockedTypes);
  await page.route("**/*", (route) => {
    if (blocked.has(route.request().resourceType())) return route.abort();
    return route.continue();
  });
}
