/**
 * Bot-challenge detection on fetched HTML
 */

import { load as loadHtml } from "cheerio";

/** Provider markers, matched case-insensitively against the raw HTML */
export const CAPTCHA_TEXT_MARKERS = [
  "g-recaptcha",
  "recaptcha/api",
  "hcaptcha.com",
  "h-captcha",
  "i'm not a robot",
  "unusual traffic",
  "press & hold",
  "distil_r_captcha",
  "incapsula incident id",
  "_incapsula_resource",
  "perimeterx",
  "px-captcha",
];

export const CAPTCHA_SELECTORS = [
  'iframe[src*="captcha"]',
  'iframe[src*="recaptcha"]',
  'iframe[title*="recaptcha" i]',
  'div[class*="captcha"]',
  'div[id*="captcha"]',
  "#px-captcha",
];

export function findCaptchaMarker(html: string): string | null {
  const lower = html.toLowerCase();
  const marker = CAPTCHA_TEXT_MARKERS.find((m) => lower.includes(m));
  if (marker) return marker;
  const $ = loadHtml(html);
  return CAPTCHA_SELECTORS.find((selector) => $(selector).length > 0) ?? null;
}

export function detectCaptchaInHtml(html: string): boolean {
  return findCaptchaMarker(html) != null;
}
