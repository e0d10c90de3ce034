/**
 * Stealth profiles: everything that makes an automated context look like a
 * person's browser, behind one `configure(context)` call.
 */

import type { BrowserContext, BrowserContextOptions } from "playwright";
import { BROWSER_CONSTANTS } from "../constants";
import type { BrowserIdentity } from "./identities";

export interface StealthProfile<TContext> {
  readonly name: string;
  configure(context: TContext): Promise<void>;
}

/** Languages list for navigator.languages from an Accept-Language value */
export function languagesOf(acceptLanguage: string): string[] {
  return acceptLanguage
    .split(",")
    .map((part) => part.split(";")[0].trim())
    .filter(Boolean);
}

/** Init script run in every frame before page scripts */
export function stealthInitScript(identity: BrowserIdentity): string {
  const languages = JSON.stringify(languagesOf(identity.acceptLanguage));
  const platform = JSON.stringify(identity.platform);
  return `
Object.defineProperty(navigator, "webdriver", { get: () => undefined });
Object.defineProperty(navigator, "plugins", {
  get: () => [
    { name: "Chrome PDF Plugin", filename: "internal-pdf-viewer", description: "Portable Document Format", length: 1 },
    { name: "Chrome PDF Viewer", filename: "mhjfbmdgcfjbbpaeojofohoefgiehjai", description: "Portable Document Format", length: 1 },
    { name: "PDF Viewer", filename: "internal-pdf-viewer", description: "Portable Document Format", length: 1 },
  ],
});
window.chrome = { runtime: {}, loadTimes: function () {}, csi: function () {}, app: {} };
const originalQuery = window.navigator.permissions.query;
window.navigator.permissions.query = (parameters) =>
  parameters.name === "notifications"
    ? Promise.resolve({ state: Notification.permission })
    : originalQuery(parameters);
Object.defineProperty(navigator, "languages", { get: () => ${languages} });
Object.defineProperty(navigator, "vendor", { get: () => "Google Inc." });
Object.defineProperty(navigator, "maxTouchPoints", { get: () => 0 });
Object.defineProperty(navigator, "platform", { get: () => ${platform} });
Object.defineProperty(navigator, "productSub", { get: () => "20030107" });
`;
}

/** New-context options matching the identity */
export function contextOptionsFor(identity: BrowserIdentity): BrowserContextOptions {
  return {
    userAgent: identity.userAgent,
    viewport: identity.viewport,
    locale: BROWSER_CONSTANTS.LOCALE,
    timezoneId: identity.timezone,
    hasTouch: false,
    isMobile: false,
    colorScheme: "light",
  };
}

export class PlaywrightStealthProfile implements StealthProfile<BrowserContext> {
  readonly name = "playwright-chromium";

  constructor(private readonly identity: BrowserIdentity) {}

  async configure(context: BrowserContext): Promise<void> {
    await context.setExtraHTTPHeaders({
      "Accept-Language": this.identity.acceptLanguage,
      Accept: BROWSER_CONSTANTS.ACCEPT_HEADER,
      "Upgrade-Insecure-Requests": "1",
    });
    await context.addInitScript({ content: stealthInitScript(this.identity) });
  }
}
