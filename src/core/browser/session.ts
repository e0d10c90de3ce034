/**
 * Engine-neutral browser session, plus its Playwright implementation
 */

import type { Browser, BrowserContext, Page } from "playwright";
import { TransientNetworkError } from "../errors";
import type { BrowserConfig } from "../types/config";
import type { Logger } from "../utils/logger";
import type { Sleep } from "../utils/sleep";
import type { BrowserIdentity } from "./identities";
import { humanDelay, randomMouseMove, scrollPage, type HumanOptions } from "./human";
import { launchBrowser, playwrightProxy } from "./launcher";
import { optimizePage } from "./optimization";
import { dismissPopups } from "./popups";
import { routeViaSearchEngine } from "./search-route";
import { PlaywrightStealthProfile, contextOptionsFor, type StealthProfile } from "./stealth";

/** What the browser fetcher drives; tests substitute their own */
export interface BrowserSession {
  readonly identity: BrowserIdentity;
  /** Main-document status, null when the engine reports none */
  goto(url: string): Promise<number | null>;
  content(): Promise<string>;
  currentUrl(): string;
  dismissPopups(): Promise<void>;
  browseLikeHuman(): Promise<void>;
  routeViaSearchEngine(query: string, targetHost: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  openSession(identity: BrowserIdentity): Promise<BrowserSession>;
  close(): Promise<void>;
}

/** Navigation timeouts and net::ERR_* failures are transient */
export function classifyNavigationError(error: unknown, url: string): unknown {
  if (error instanceof Error && (error.name === "TimeoutError" || /net::ERR_|Timeout/.test(error.message))) {
    return new TransientNetworkError(`${error.message.split("\n")[0]} for ${url}`, undefined, { cause: error });
  }
  return error;
}

interface SessionOptions extends HumanOptions {
  logger: Logger;
  timeoutMs: number;
  engineUrl: string;
}

class PlaywrightSession implements BrowserSession {
  constructor(
    readonly identity: BrowserIdentity,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: SessionOptions,
  ) {}

  async goto(url: string): Promise<number | null> {
    try {
      const response = await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.timeoutMs });
      return response?.status() ?? null;
    } catch (error) {
      throw classifyNavigationError(error, url);
    }
  }

  content(): Promise<string> {
    return this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  async dismissPopups(): Promise<void> {
    await dismissPopups(this.page, this.options.logger);
  }

  async browseLikeHuman(): Promise<void> {
    await humanDelay(this.options, 800, 2_000);
    await randomMouseMove(this.page, this.options);
    await scrollPage(this.page, this.options);
  }

  routeViaSearchEngine(query: string, targetHost: string): Promise<boolean> {
    return routeViaSearchEngine(this.page, query, targetHost, this.options);
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

export interface PlaywrightDriverOptions {
  headless: boolean;
  browser: BrowserConfig;
  /** Read at every new context so proxy rotation reaches the browser */
  proxyUrl: () => string | null;
  logger: Logger;
  random: () => number;
  sleep: Sleep;
  signal?: AbortSignal;
  stealthFor?: (identity: BrowserIdentity) => StealthProfile<BrowserContext>;
}

/** One browser per run, one context per identity */
export class PlaywrightBrowserDriver implements BrowserDriver {
  private browser: Browser | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: PlaywrightDriverOptions) {
    this.logger = options.logger.child({ component: "browser" });
  }

  async openSession(identity: BrowserIdentity): Promise<BrowserSession> {
    if (!this.browser) {
      this.logger.info({ headless: this.options.headless }, "Launching browser");
      this.browser = await launchBrowser({ headless: this.options.headless });
    }
    const proxyUrl = this.options.proxyUrl();
    const context = await this.browser.newContext({
      ...contextOptionsFor(identity),
      proxy: proxyUrl ? playwrightProxy(proxyUrl) : undefined,
    });
    const stealth = this.options.stealthFor?.(identity) ?? new PlaywrightStealthProfile(identity);
    await stealth.configure(context);

    const page = await context.newPage();
    await optimizePage(page, this.options.browser.blockResources);
    this.logger.info({ identity: identity.name, stealth: stealth.name }, "Browser context ready");

    return new PlaywrightSession(identity, context, page, {
      logger: this.logger,
      timeoutMs: this.options.browser.pageLoadTimeoutMs,
      engineUrl: this.options.browser.searchEngineUrl,
      random: this.options.random,
      sleep: this.options.sleep,
      signal: this.options.signal,
    });
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    await this.browser.close();
    this.browser = null;
    this.logger.info("Browser closed");
  }
}
