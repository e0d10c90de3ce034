/**
 * Site config loading: configs/<slug>.json → frozen SiteConfig
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { ConfigError } from "../errors";
import { FINGERPRINT_POOL, isKnownFingerprint } from "../network/fingerprints";
import {
  PLATFORM_KINDS,
  type BrowserConfig,
  type ErrorHandlingConfig,
  type ProxyConfig,
  type RateLimitConfig,
  type SearchApiConfig,
  type SiteConfig,
  type StoreRotationConfig,
  type TlsConfig,
} from "../types/config";
import { isMissing } from "../utils/log-files";
import { DEFAULT_STORES, SITE_DEFAULTS as D } from "./defaults";
import { ConfigReader } from "./reader";

function readRateLimit(r: ConfigReader): RateLimitConfig {
  const minDelayMs = r.number("min_delay_ms", D.minDelayMs, { min: 0 });
  const maxDelayMs = r.number("max_delay_ms", Math.max(D.maxDelayMs, minDelayMs), { min: 0 });
  if (maxDelayMs < minDelayMs) {
    throw new ConfigError("rate_limit.max_delay_ms must be >= rate_limit.min_delay_ms", "rate_limit.max_delay_ms");
  }
  return {
    minDelayMs,
    maxDelayMs,
    requestsPerMinute: r.number("requests_per_minute", D.requestsPerMinute, { min: 1, integer: true }),
    captchaAware: r.boolean("captcha_aware", false),
    captchaThreshold: r.number("captcha_threshold", D.captchaThreshold, { min: 0 }),
  };
}

function readProxy(r: ConfigReader): ProxyConfig {
  return {
    enabled: r.boolean("enabled", false),
    source: r.oneOf("source", ["env", "file", "list"] as const, "env"),
    envVar: r.string("env_var", D.proxyEnvVar),
    filePath: r.optionalString("file_path"),
    proxies: r.stringList("proxies", []),
    rotationStrategy: r.oneOf("rotation_strategy", ["round_robin", "random"] as const, "round_robin"),
    maxFailuresBeforeRotate: r.number("max_failures_before_rotate", D.maxFailuresBeforeRotate, {
      min: 1,
      integer: true,
    }),
  };
}

function readTls(r: ConfigReader): TlsConfig {
  const clientIdentifier = r.string("client_identifier", D.clientIdentifier);
  const fallbackIdentifiers = r.stringList("fallback_identifiers", FINGERPRINT_POOL.slice(0, 5));
  for (const id of [clientIdentifier, ...fallbackIdentifiers]) {
    if (!isKnownFingerprint(id)) {
      throw new ConfigError(`Unknown TLS client identifier "${id}"`, "tls.client_identifier");
    }
  }
  return {
    clientIdentifier,
    fallbackIdentifiers,
    randomizeFingerprint: r.boolean("randomize_fingerprint", true),
    transport: r.oneOf("transport", ["impersonate", "passthrough"] as const, "impersonate"),
  };
}

function readStoreRotation(r: ConfigReader): StoreRotationConfig {
  const stores = r.sections("stores").map((s) => ({
    id: s.requiredString("id"),
    name: s.requiredString("name"),
    city: s.string("city", ""),
    province: s.string("province", ""),
  }));
  return {
    enabled: r.boolean("enabled", false),
    mode: r.oneOf("mode", ["all", "sample", "single"] as const, "sample"),
    sampleSize: r.optionalNumber("sample_size", { min: 1, integer: true }),
    stores: stores.length > 0 ? stores : DEFAULT_STORES.map((s) => ({ ...s })),
  };
}

function readErrorHandling(r: ConfigReader): ErrorHandlingConfig {
  const jitter = r.numberList("jitter_range", D.jitterRange);
  if (jitter.length !== 2 || jitter[0] < 0 || jitter[1] < jitter[0]) {
    throw new ConfigError("error_handling.jitter_range must be [min, max] seconds", "error_handling.jitter_range");
  }
  return {
    maxRetries: r.number("max_retries", D.maxRetries, { min: 0, integer: true }),
    retryOnStatusCodes: r.numberList("retry_on_status_codes", D.retryOnStatusCodes),
    rotateProxyOn403: r.boolean("rotate_proxy_on_403", true),
    rotateFingerprintOn403: r.boolean("rotate_fingerprint_on_403", true),
    backoffBase: r.number("backoff_base", D.backoffBase, { min: 1 }),
    maxBackoffSeconds: r.number("max_backoff_seconds", D.maxBackoffSeconds, { min: 0 }),
    jitterRange: [jitter[0], jitter[1]],
  };
}

function readBrowser(r: ConfigReader): BrowserConfig {
  return {
    warmup: r.boolean("warmup", false),
    warmupPaths: r.stringList("warmup_paths", []),
    searchEngineRouting: r.boolean("search_engine_routing", false),
    searchEngineUrl: r.string("search_engine_url", D.searchEngineUrl),
    pageLoadTimeoutMs: r.number("page_load_timeout_ms", D.pageLoadTimeoutMs, { min: 1 }),
    blockResources: r.stringList("block_resources", D.blockResources),
    productSelectors: r.has("product_selectors") ? r.stringList("product_selectors", []) : null,
    nextPageSelectors: r.stringList("next_page_selectors", D.nextPageSelectors),
  };
}

function readSearchApi(r: ConfigReader): SearchApiConfig {
  return {
    url: r.requiredString("url").replace(/\/+$/, ""),
    appId: r.requiredString("app_id"),
    apiKeyEnv: r.requiredString("api_key_env"),
    indexName: r.requiredString("index_name"),
    hitsPerPage: r.number("hits_per_page", D.hitsPerPage, { min: 1, integer: true }),
    storeFilterAttribute: r.optionalString("store_filter_attribute"),
    agent: r.optionalString("agent"),
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

/** Validates a parsed config document and fills in defaults */
export function resolveSiteConfig(raw: unknown, source = "<inline>"): SiteConfig {
  const r = ConfigReader.root(raw, source);
  const platform = r.oneOf("platform", PLATFORM_KINDS, "page-state");
  const baseUrl = r.requiredString("base_url").replace(/\/+$/, "");
  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigError(`Invalid config key "base_url": "${baseUrl}" is not a URL`, "base_url");
  }
  if (platform === "search-index" && !r.has("search_api")) {
    throw new ConfigError('search-index sites need a "search_api" section', "search_api");
  }

  const config: SiteConfig = {
    siteSlug: r.requiredString("site_slug"),
    storeName: r.requiredString("store_name"),
    platform,
    baseUrl,
    searchUrlPattern: r.string("search_url_pattern", D.searchUrlPattern),
    searchParam: r.string("search_param", D.searchParam),
    pageParam: r.string("page_param", D.pageParam),
    currency: r.string("currency", D.currency),
    headers: r.stringMap("headers"),
    rateLimit: readRateLimit(r.section("rate_limit")),
    maxBackups: r.number("max_backups", D.maxBackups, { min: 0, integer: true }),
    compressBackups: r.boolean("compress_backups", D.compressBackups),
    proxy: readProxy(r.section("proxy")),
    tls: readTls(r.section("tls")),
    storeRotation: readStoreRotation(r.section("store_rotation")),
    errorHandling: readErrorHandling(r.section("error_handling")),
    browser: readBrowser(r.section("browser")),
    searchApi: r.has("search_api") ? readSearchApi(r.section("search_api")) : null,
    interStoreDelayMs: r.number("inter_store_delay_ms", D.interStoreDelayMs, { min: 0 }),
    outputFormat: r.oneOf("output_format", ["jsonl", "csv", "both"] as const, "jsonl"),
  };
  return deepFreeze(config);
}

export function siteConfigPath(slug: string, configDir: string): string {
  return path.join(configDir, `${slug}.json`);
}

/**
 * Reads configs/<slug>.json
 * @throws ConfigError when the file is missing, not JSON, or invalid
 */
export async function loadSiteConfig(slug: string, configDir: string): Promise<SiteConfig> {
  const file = siteConfigPath(slug, configDir);
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (error) {
    if (isMissing(error)) throw new ConfigError(`Config file not found: ${file}`);
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${file} (${String(error)})`);
  }

  const config = resolveSiteConfig(raw, file);
  if (config.siteSlug !== slug) {
    throw new ConfigError(`${file}: site_slug "${config.siteSlug}" does not match "${slug}"`, "site_slug");
  }
  return config;
}

/** Slugs with a config file in `configDir` */
export async function listSiteConfigs(configDir: string): Promise<string[]> {
  try {
    const names = await fs.readdir(configDir);
    return names
      .filter((n) => n.endsWith(".json"))
      .map((n) => n.slice(0, -".json".length))
      .sort();
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }
}
