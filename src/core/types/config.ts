/**
 * Site configuration types (resolved, camelCase form)
 */

export const PLATFORM_KINDS = ["page-state", "search-index"] as const;
export type PlatformKind = (typeof PLATFORM_KINDS)[number];
export type ProxySource = "env" | "file" | "list";
export type RotationStrategy = "round_robin" | "random";
export type StoreMode = "all" | "sample" | "single";
export type OutputFormat = "jsonl" | "csv" | "both";
export type TransportKind = "impersonate" | "passthrough";

/** Pacing per site */
export interface RateLimitConfig {
  minDelayMs: number;
  maxDelayMs: number;
  requestsPerMinute: number;
  captchaAware: boolean;
  captchaThreshold: number; // captcha/request ratio that triggers the 1.5x slowdown
}

export interface ProxyConfig {
  enabled: boolean;
  source: ProxySource;
  envVar: string;
  filePath: string | null;
  proxies: string[];
  rotationStrategy: RotationStrategy;
  maxFailuresBeforeRotate: number;
}

export interface TlsConfig {
  clientIdentifier: string;
  fallbackIdentifiers: string[];
  randomizeFingerprint: boolean;
  transport: TransportKind;
}

export interface StoreLocation {
  id: string;
  name: string;
  city: string;
  province: string;
}

export interface StoreRotationConfig {
  enabled: boolean;
  mode: StoreMode;
  sampleSize: number | null; // null = half the list
  stores: StoreLocation[];
}

export interface ErrorHandlingConfig {
  maxRetries: number;
  retryOnStatusCodes: number[];
  rotateProxyOn403: boolean;
  rotateFingerprintOn403: boolean;
  backoffBase: number;
  maxBackoffSeconds: number;
  jitterRange: [number, number]; // seconds
}

export interface BrowserConfig {
  warmup: boolean;
  warmupPaths: string[];
  searchEngineRouting: boolean;
  searchEngineUrl: string;
  pageLoadTimeoutMs: number;
  blockResources: string[];
  /** Override for the product tile container selectors */
  productSelectors: string[] | null;
  nextPageSelectors: string[];
}

export interface SearchApiConfig {
  url: string;
  appId: string;
  apiKeyEnv: string;
  indexName: string;
  hitsPerPage: number;
  storeFilterAttribute: string | null;
  agent: string | null;
}

/** Immutable for the duration of a run */
export interface SiteConfig {
  siteSlug: string;
  storeName: string;
  platform: PlatformKind;
  baseUrl: string;
  searchUrlPattern: string;
  searchParam: string;
  pageParam: string;
  currency: string;
  headers: Record<string, string>;
  rateLimit: RateLimitConfig;
  maxBackups: number;
  compressBackups: boolean;
  proxy: ProxyConfig;
  tls: TlsConfig;
  storeRotation: StoreRotationConfig;
  errorHandling: ErrorHandlingConfig;
  browser: BrowserConfig;
  searchApi: SearchApiConfig | null;
  interStoreDelayMs: number;
  outputFormat: OutputFormat;
}
