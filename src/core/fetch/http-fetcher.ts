/**
 * HTTP fetching with pacing, retries and bot-detection escalation
 */

import { detectCaptchaInHtml } from "../browser/captcha";
import { BotDetectionError, HttpStatusError, TransientNetworkError, type BotDetectionReason } from "../errors";
import type { ClientRequestOptions } from "../network/tls-client";
import type { ProxyManager } from "../network/proxy-manager";
import type { HttpMethod, TransportResponse } from "../network/transport";
import type { Pacer } from "../pacing/rate-limiter";
import type { ErrorHandlingConfig } from "../types/config";
import type { Logger } from "../utils/logger";
import { withRetry, isTransientError } from "../utils/retry";
import type { Sleep } from "../utils/sleep";

/** The slice of the fingerprint client the fetcher uses */
export interface HttpClient {
  request(method: HttpMethod, url: string, options?: ClientRequestOptions): Promise<TransportResponse>;
  rotateFingerprint(): string;
  close(): Promise<void>;
}

export interface HttpFetcherOptions {
  client: HttpClient;
  pacer: Pacer;
  errorHandling: ErrorHandlingConfig;
  logger: Logger;
  proxyManager?: ProxyManager;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
}

export interface FetchedHtml {
  url: string;
  status: number;
  html: string;
}

export class HttpFetcher {
  private readonly client: HttpClient;
  private readonly pacer: Pacer;
  private readonly errorHandling: ErrorHandlingConfig;
  private readonly logger: Logger;
  private readonly proxyManager: ProxyManager | undefined;

  constructor(private readonly options: HttpFetcherOptions) {
    this.client = options.client;
    this.pacer = options.pacer;
    this.errorHandling = options.errorHandling;
    this.logger = options.logger.child({ component: "http-fetcher" });
    this.proxyManager = options.proxyManager;
  }

  /** One paced request; retryable statuses surface as TransientNetworkError */
  private async attempt(method: HttpMethod, url: string, request: ClientRequestOptions): Promise<TransportResponse> {
    await this.pacer.wait();
    let response: TransportResponse;
    try {
      response = await this.client.request(method, url, request);
    } catch (error) {
      this.proxyManager?.reportFailure();
      throw error;
    }
    if (this.errorHandling.retryOnStatusCodes.includes(response.status)) {
      this.proxyManager?.reportFailure();
      throw new TransientNetworkError(`HTTP ${response.status} for ${url}`, response.status);
    }
    return response;
  }

  private detectBot(response: TransportResponse, checkCaptcha: boolean): BotDetectionReason | null {
    if (response.status === 403) return "status-403";
    if (checkCaptcha && detectCaptchaInHtml(response.body)) return "captcha";
    return null;
  }

  /** Rotation first, then the caller slows down */
  private escalate(reason: BotDetectionReason, url: string, detections: number): void {
    this.pacer.reportCaptcha();
    const rotated: string[] = [];
    if (this.errorHandling.rotateFingerprintOn403) rotated.push(`fingerprint:${this.client.rotateFingerprint()}`);
    if (this.errorHandling.rotateProxyOn403 && this.proxyManager?.isEnabled) {
      this.proxyManager.rotate();
      rotated.push("proxy");
    }
    this.logger.warn({ reason, url, detections, rotated }, "Bot detection, escalating before retry");
  }

  /**
   * Transient failures are retried with backoff; bot detection rotates
   * identity and waits adaptively, escalating while it recurs. Non-2xx
   * afterwards is an HttpStatusError.
   */
  async send(
    method: HttpMethod,
    url: string,
    request: ClientRequestOptions = {},
    checkCaptcha = false,
  ): Promise<TransportResponse> {
    const { maxRetries, backoffBase, maxBackoffSeconds, jitterRange } = this.errorHandling;
    for (let detections = 0; ; ) {
      const response = await withRetry(() => this.attempt(method, url, request), {
        maxRetries,
        backoffBase,
        maxBackoffMs: maxBackoffSeconds * 1000,
        jitterRange,
        retryOn: isTransientError,
        label: `${method} ${url}`,
        logger: this.logger,
        sleep: this.options.sleep,
        random: this.options.random,
        signal: this.options.signal,
      });

      const reason = this.detectBot(response, checkCaptcha);
      if (!reason) {
        if (response.status < 200 || response.status >= 300) throw new HttpStatusError(response.status, url);
        this.proxyManager?.reportSuccess();
        return response;
      }

      detections++;
      if (detections > maxRetries) throw new BotDetectionError(reason, url, detections);
      this.escalate(reason, url, detections);
      await this.pacer.adaptiveWait(detections);
    }
  }

  async fetchHtml(url: string, headers?: Record<string, string>): Promise<FetchedHtml> {
    const response = await this.send("GET", url, { headers }, true);
    this.logger.debug({ url, status: response.status, bytes: response.body.length }, "Fetched page");
    return { url: response.url || url, status: response.status, html: response.body };
  }

  async postJson(url: string, body: unknown, headers?: Record<string, string>): Promise<unknown> {
    const response = await this.send("POST", url, { json: body, headers });
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new TransientNetworkError(`Invalid JSON from ${url}`, response.status, { cause: error });
    }
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
