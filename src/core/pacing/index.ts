import type { RateLimitConfig } from "../types/config";
import { CaptchaAwareRateLimiter } from "./captcha-rate-limiter";
import { RateLimiter, type RateLimiterOptions } from "./rate-limiter";

export * from "./captcha-rate-limiter";
export * from "./rate-limiter";

type PacerDeps = Omit<RateLimiterOptions, "minDelayMs" | "maxDelayMs" | "requestsPerMinute">;

/** Picks the limiter a site's rate_limit section asks for */
export function createPacer(config: RateLimitConfig, deps: PacerDeps): RateLimiter {
  const base = {
    ...deps,
    minDelayMs: config.minDelayMs,
    maxDelayMs: config.maxDelayMs,
    requestsPerMinute: config.requestsPerMinute,
  };
  return config.captchaAware
    ? new CaptchaAwareRateLimiter({ ...base, captchaThreshold: config.captchaThreshold })
    : new RateLimiter(base);
}
