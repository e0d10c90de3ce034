/**
 * Default site settings, applied wherever a config file is silent
 */

import { EXECUTION_CONSTANTS, RECORD_CONSTANTS } from "../constants/index";
import type { StoreLocation } from "../types/config";

export const SITE_DEFAULTS = {
  searchUrlPattern: "/search",
  searchParam: "search-bar",
  pageParam: "page",
  currency: RECORD_CONSTANTS.DEFAULT_CURRENCY,
  minDelayMs: 2_000,
  maxDelayMs: 5_000,
  requestsPerMinute: 15,
  captchaThreshold: 0.3,
  maxBackups: 5,
  compressBackups: false,
  proxyEnvVar: "PROXY_URL",
  maxFailuresBeforeRotate: 3,
  clientIdentifier: "chrome_120",
  maxRetries: 3,
  retryOnStatusCodes: [429, 500, 502, 503, 504],
  backoffBase: 2,
  maxBackoffSeconds: 60,
  jitterRange: [0, 1] as [number, number],
  interStoreDelayMs: EXECUTION_CONSTANTS.DEFAULT_INTER_STORE_DELAY_MS,
  hitsPerPage: 48,
  pageLoadTimeoutMs: 30_000,
  searchEngineUrl: "https://www.google.com/",
  blockResources: ["image", "font", "media"],
  nextPageSelectors: [
    'a[aria-label="Next"]',
    'button[aria-label="Next"]',
    ".pagination-next",
    'a[rel="next"]',
  ],
};

/** Alberta storefronts used when a search-index site enables rotation without a list */
export const DEFAULT_STORES: StoreLocation[] = [
  { id: "0320", name: "Sobeys Airdrie", city: "Airdrie", province: "AB" },
  { id: "0315", name: "Sobeys Shawnessy", city: "Calgary", province: "AB" },
  { id: "0348", name: "Sobeys Signal Hill", city: "Calgary", province: "AB" },
  { id: "0325", name: "Sobeys Crowfoot", city: "Calgary", province: "AB" },
  { id: "0521", name: "Sobeys Riverbend", city: "Edmonton", province: "AB" },
  { id: "0515", name: "Sobeys Summerside", city: "Edmonton", province: "AB" },
  { id: "0530", name: "Sobeys Windermere", city: "Edmonton", province: "AB" },
  { id: "0535", name: "Sobeys St. Albert", city: "St. Albert", province: "AB" },
];
