import { describe, expect, it } from "vitest";
import { fakeClock, silentLogger } from "../../__tests__/helpers";
import { createPacer } from "..";
import { CaptchaAwareRateLimiter, gaussian } from "../captcha-rate-limiter";
import { RateLimiter } from "../rate-limiter";

const logger = silentLogger();

describe("RateLimiter", () => {
  it("blocks the 16th call until the window has a free slot", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({
      minDelayMs: 0,
      maxDelayMs: 0,
      requestsPerMinute: 15,
      logger,
      now: clock.now,
      sleep: clock.sleep,
    });

    for (let i = 0; i < 15; i++) await limiter.wait();
    expect(clock.slept.every((ms) => ms === 0)).toBe(true);

    await limiter.wait();
    expect(clock.slept[15]).toBeGreaterThanOrEqual(60_000);
    expect(limiter.stats).toEqual({ requests: 16, captchas: 0, inWindow: 1 });
  });

  it("sleeps a jittered delay inside the configured bounds", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({
      minDelayMs: 2000,
      maxDelayMs: 5000,
      requestsPerMinute: 15,
      logger,
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0.5,
    });
    await limiter.wait();
    expect(clock.slept).toEqual([3500]);
  });

  it("backs off exponentially and caps at five minutes", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({
      minDelayMs: 1000,
      maxDelayMs: 5000,
      requestsPerMinute: 15,
      logger,
      now: clock.now,
      sleep: clock.sleep,
    });
    await limiter.adaptiveWait(2);
    await limiter.adaptiveWait(10);
    expect(clock.slept).toEqual([20_000, 300_000]);
  });
});

describe("CaptchaAwareRateLimiter", () => {
  const build = () => {
    const clock = fakeClock();
    const limiter = new CaptchaAwareRateLimiter({
      minDelayMs: 2000,
      maxDelayMs: 5000,
      requestsPerMinute: 100,
      captchaThreshold: 0.3,
      logger,
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0.5,
    });
    return { clock, limiter };
  };

  it("escalates the mean delay with the captcha ratio", async () => {
    const { limiter } = build();
    for (let i = 0; i < 10; i++) await limiter.wait();
    expect(limiter.meanDelayMs()).toBe(3500);

    for (let i = 0; i < 4; i++) limiter.reportCaptcha();
    expect(limiter.multiplier).toBe(1.5);
    expect(limiter.meanDelayMs()).toBe(5250);

    for (let i = 0; i < 2; i++) limiter.reportCaptcha();
    expect(limiter.multiplier).toBe(2.5);
  });

  it("keeps gaussian jitter within half to one and a half of the mean", async () => {
    const { clock, limiter } = build();
    await limiter.wait();
    expect(clock.slept[0]).toBeGreaterThanOrEqual(1750);
    expect(clock.slept[0]).toBeLessThanOrEqual(5250);
  });

  it("samples around the mean", () => {
    // u2 = 0.25 puts cos(2πu2) at zero
    expect(gaussian(100, 10, () => 0.25)).toBeCloseTo(100);
  });
});

describe("createPacer", () => {
  it("picks the captcha-aware limiter when configured", () => {
    const config = { minDelayMs: 1, maxDelayMs: 2, requestsPerMinute: 5, captchaAware: true, captchaThreshold: 0.3 };
    expect(createPacer(config, { logger })).toBeInstanceOf(CaptchaAwareRateLimiter);
    expect(createPacer({ ...config, captchaAware: false }, { logger })).not.toBeInstanceOf(CaptchaAwareRateLimiter);
  });
});
