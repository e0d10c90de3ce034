import { describe, expect, it } from "vitest";
import { detectCaptchaInHtml, findCaptchaMarker } from "../captcha";

describe("findCaptchaMarker", () => {
  it("matches provider text case-insensitively", () => {
    expect(findCaptchaMarker('<div class="G-RECAPTCHA" data-sitekey="x"></div>')).toBe("g-recaptcha");
    expect(findCaptchaMarker("<p>We detected Unusual Traffic from your network</p>")).toBe("unusual traffic");
  });

  it("falls back to challenge selectors", () => {
    expect(findCaptchaMarker('<iframe src="https://challenge.test/captcha/frame"></iframe>')).toBe(
      'iframe[src*="captcha"]',
    );
    expect(findCaptchaMarker('<section><div id="slider-captcha-box"></div></section>')).toBe('div[id*="captcha"]');
  });

  it("returns null for an ordinary product page", () => {
    expect(findCaptchaMarker('<main><h1>Whole Milk</h1><span class="price">$4.99</span></main>')).toBeNull();
  });
});

describe("detectCaptchaInHtml", () => {
  it("is a boolean view of the marker search", () => {
    expect(detectCaptchaInHtml("<div>Press & Hold to confirm</div>")).toBe(true);
    expect(detectCaptchaInHtml("<div>Bananas</div>")).toBe(false);
  });
});
