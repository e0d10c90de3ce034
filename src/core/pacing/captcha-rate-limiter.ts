/**
 * Rate limiter whose mean delay grows with the rolling CAPTCHA ratio
 */

import { RateLimiter, type RateLimiterOptions } from "./rate-limiter";

export interface CaptchaAwareOptions extends RateLimiterOptions {
  /** Ratio above which the mean delay is multiplied by 1.5 (above 0.5: 2.5) */
  captchaThreshold?: number;
}

/** Box–Muller normal sample */
export function gaussian(mean: number, std: number, random: () => number): number {
  const u1 = Math.max(random(), Number.MIN_VALUE);
  const u2 = random();
  return mean + std * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

export class CaptchaAwareRateLimiter extends RateLimiter {
  private readonly captchaThreshold: number;

  constructor(options: CaptchaAwareOptions) {
    super(options);
    this.captchaThreshold = options.captchaThreshold ?? 0.3;
  }

  get captchaRate(): number {
    return this.captchaCount / Math.max(this.requestCount, 1);
  }

  get multiplier(): number {
    const rate = this.captchaRate;
    if (rate > 0.5) return 2.5;
    if (rate > this.captchaThreshold) return 1.5;
    return 1;
  }

  /** Base is the midpoint of the configured bounds */
  meanDelayMs(): number {
    return ((this.minDelayMs + this.maxDelayMs) / 2) * this.multiplier;
  }

  protected override nextDelayMs(): number {
    const mean = this.meanDelayMs();
    const sample = gaussian(mean, mean * 0.3, this.random);
    return Math.min(Math.max(sample, mean * 0.5), mean * 1.5);
  }
}
