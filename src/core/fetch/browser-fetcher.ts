/**
 * Browser-automation fetching: warm-up, search-engine entry, popups and
 * challenge handling around every page load
 */

import { detectCaptchaInHtml } from "../browser/captcha";
import { pickIdentity, type BrowserIdentity } from "../browser/identities";
import type { BrowserDriver, BrowserSession } from "../browser/session";
import { warmupSession } from "../browser/warmup";
import { BotDetectionError, TransientNetworkError, type BotDetectionReason } from "../errors";
import type { Pacer } from "../pacing/rate-limiter";
import type { SiteConfig } from "../types/config";
import type { Logger } from "../utils/logger";
import { withRetry, isTransientError } from "../utils/retry";
import type { Sleep } from "../utils/sleep";
import { hostOf } from "../utils/url";
import type { FetchedHtml } from "./http-fetcher";

export interface BrowserFetcherOptions {
  config: SiteConfig;
  driver: BrowserDriver;
  pacer: Pacer;
  logger: Logger;
  random?: () => number;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export interface BrowserFetchOptions {
  /** Search term used for search-engine routing on the first navigation */
  query?: string | null;
}

export class BrowserFetcher {
  private readonly config: SiteConfig;
  private readonly driver: BrowserDriver;
  private readonly pacer: Pacer;
  private readonly logger: Logger;
  private readonly random: () => number;
  private session: BrowserSession | null = null;
  private identity: BrowserIdentity | null = null;
  private routed = false;

  constructor(private readonly options: BrowserFetcherOptions) {
    this.config = options.config;
    this.driver = options.driver;
    this.pacer = options.pacer;
    this.logger = options.logger.child({ component: "browser-fetcher" });
    this.random = options.random ?? Math.random;
  }

  /** Lazily opens a session; every new session is warmed up when configured */
  private async ensureSession(): Promise<BrowserSession> {
    if (this.session) return this.session;
    this.identity = pickIdentity(this.random, this.identity);
    const session = await this.driver.openSession(this.identity);
    this.session = session;
    if (this.config.browser.warmup) {
      await warmupSession(session, {
        baseUrl: this.config.baseUrl,
        paths: this.config.browser.warmupPaths,
        random: this.random,
        logger: this.logger,
      });
    }
    return session;
  }

  /** New context under a different identity */
  async rotateIdentity(): Promise<void> {
    const previous = this.session;
    this.session = null;
    if (previous) await previous.close();
    const session = await this.ensureSession();
    this.logger.info({ identity: session.identity.name }, "Rotated browser identity");
  }

  private async routeOnce(session: BrowserSession, query: string | null | undefined): Promise<void> {
    if (this.routed || !query || !this.config.browser.searchEngineRouting) return;
    this.routed = true;
    const host = hostOf(this.config.baseUrl);
    if (!host) return;
    const arrived = await session.routeViaSearchEngine(`${this.config.storeName} ${query}`, host);
    this.logger.info({ arrived }, arrived ? "Entered site via search engine" : "Search engine entry skipped");
    if (arrived) await session.dismissPopups();
  }

  private async load(url: string, options: BrowserFetchOptions): Promise<{ status: number | null; html: string; url: string }> {
    await this.pacer.wait();
    const session = await this.ensureSession();
    await this.routeOnce(session, options.query);
    const status = await session.goto(url);
    if (status != null && this.config.errorHandling.retryOnStatusCodes.includes(status)) {
      throw new TransientNetworkError(`HTTP ${status} for ${url}`, status);
    }
    await session.dismissPopups();
    await session.browseLikeHuman();
    return { status, html: await session.content(), url: session.currentUrl() };
  }

  /**
   * Loads `url` and returns the rendered HTML. Challenges (403 or a
   * CAPTCHA) rotate the identity and back off adaptively; after
   * `max_retries` of them the page is given up with BotDetectionError.
   */
  async fetchPage(url: string, options: BrowserFetchOptions = {}): Promise<FetchedHtml> {
    const { maxRetries, backoffBase, maxBackoffSeconds, jitterRange } = this.config.errorHandling;
    for (let detections = 0; ; ) {
      const page = await withRetry(() => this.load(url, options), {
        maxRetries,
        backoffBase,
        maxBackoffMs: maxBackoffSeconds * 1000,
        jitterRange,
        retryOn: isTransientError,
        label: `browser ${url}`,
        logger: this.logger,
        sleep: this.options.sleep,
        random: this.options.random,
        signal: this.options.signal,
      });

      const reason: BotDetectionReason | null =
        page.status === 403 ? "status-403" : detectCaptchaInHtml(page.html) ? "captcha" : null;
      if (!reason) return { url: page.url, status: page.status ?? 200, html: page.html };

      detections++;
      this.pacer.reportCaptcha();
      if (detections > maxRetries) throw new BotDetectionError(reason, url, detections);
      this.logger.warn({ reason, url, detections }, "Challenge in browser, rotating identity");
      await this.rotateIdentity();
      await this.pacer.adaptiveWait(detections);
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) await session.close();
    await this.driver.close();
  }
}
