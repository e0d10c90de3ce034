/**
 * Application constants
 */

// Execution constants
export const EXECUTION_CONSTANTS = {
  WINDOW_MS: 60_000, // rate-limit sliding window
  MAX_ADAPTIVE_WAIT_MS: 300_000, // adaptive backoff cap (5 min)
  DEFAULT_INTER_STORE_DELAY_MS: 3_000,
  DEFAULT_TIMEOUT_MS: 30_000,
} as const;

// Record constants
export const RECORD_CONSTANTS = {
  DEFAULT_CURRENCY: "CAD",
  CATEGORY_SEPARATOR: " > ",
} as const;

// Browser constants
export const BROWSER_CONSTANTS = {
  ACCEPT_HEADER:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
  LOCALE: "en-CA",
  LAUNCH_ARGS: [
    "--disable-blink-features=AutomationControlled",
    "--disable-dev-shm-usage",
    "--no-sandbox",
    "--disable-infobars",
    "--window-size=1920,1080",
  ],
  CLICK_TIMEOUT_MS: 1_500,
} as const;

// Hosted search index protocol
export const SEARCH_API_CONSTANTS = {
  QUERIES_PATH: "/1/indexes/*/queries",
  API_KEY_HEADER: "x-algolia-api-key",
  APP_ID_HEADER: "x-algolia-application-id",
  AGENT_HEADER: "x-algolia-agent",
} as const;
