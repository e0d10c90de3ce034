/**
 * Sliding-window rate limiter with jittered delays and adaptive backoff
 */

import { EXECUTION_CONSTANTS } from "../constants";
import type { Logger } from "../utils/logger";
import { sleep as defaultSleep, systemClock, uniform, type Clock, type Sleep } from "../utils/sleep";

/** What fetchers need from a pacing engine */
export interface Pacer {
  wait(): Promise<void>;
  /** Exponential slowdown after `errorCount` consecutive failures */
  adaptiveWait(errorCount: number): Promise<void>;
  reportCaptcha(): void;
}

export interface RateLimiterOptions {
  minDelayMs: number;
  maxDelayMs: number;
  requestsPerMinute: number;
  logger: Logger;
  now?: Clock;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
}

export interface PacerStats {
  requests: number;
  captchas: number;
  inWindow: number;
}

export class RateLimiter implements Pacer {
  protected readonly minDelayMs: number;
  protected readonly maxDelayMs: number;
  protected readonly requestsPerMinute: number;
  protected readonly logger: Logger;
  protected readonly now: Clock;
  protected readonly sleep: Sleep;
  protected readonly random: () => number;
  protected readonly signal: AbortSignal | undefined;

  private readonly timestamps: number[] = [];
  protected requestCount = 0;
  protected captchaCount = 0;

  constructor(options: RateLimiterOptions) {
    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = Math.max(options.maxDelayMs, options.minDelayMs);
    this.requestsPerMinute = options.requestsPerMinute;
    this.logger = options.logger.child({ component: "rate-limiter" });
    this.now = options.now ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.signal = options.signal;
  }

  /** Jittered per-request delay */
  protected nextDelayMs(): number {
    return uniform(this.minDelayMs, this.maxDelayMs, this.random);
  }

  private prune(now: number): void {
    while (this.timestamps.length > 0 && now - this.timestamps[0] >= EXECUTION_CONSTANTS.WINDOW_MS) {
      this.timestamps.shift();
    }
  }

  private record(): void {
    this.timestamps.push(this.now());
    this.requestCount++;
  }

  async wait(): Promise<void> {
    const delay = this.nextDelayMs();
    const now = this.now();
    this.prune(now);

    if (this.timestamps.length >= this.requestsPerMinute) {
      const windowWait = EXECUTION_CONSTANTS.WINDOW_MS - (now - this.timestamps[0]);
      if (windowWait > 0) {
        this.logger.warn(
          { requestsPerMinute: this.requestsPerMinute, waitMs: Math.round(windowWait + delay) },
          "Rate limit reached, waiting for a free slot",
        );
        await this.sleep(windowWait + delay, this.signal);
        this.record();
        return;
      }
    }

    await this.sleep(delay, this.signal);
    this.record();
  }

  async adaptiveWait(errorCount: number): Promise<void> {
    if (errorCount <= 0) return this.wait();
    const delay = Math.min(
      this.maxDelayMs * Math.pow(2, errorCount),
      EXECUTION_CONSTANTS.MAX_ADAPTIVE_WAIT_MS,
    );
    this.logger.warn({ errorCount, delayMs: Math.round(delay) }, "Adaptive backoff");
    await this.sleep(delay, this.signal);
    this.record();
  }

  reportCaptcha(): void {
    this.captchaCount++;
    this.logger.warn({ captchas: this.captchaCount, requests: this.requestCount }, "CAPTCHA reported");
  }

  get stats(): PacerStats {
    this.prune(this.now());
    return { requests: this.requestCount, captchas: this.captchaCount, inWindow: this.timestamps.length };
  }
}
