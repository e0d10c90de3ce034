/**
 * Shared test fixtures: silent or in-memory loggers, a fake clock whose sleeps
 * advance time, and record factories
 */

import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import pino from "pino";
import { resolveSiteConfig } from "../config/site-config";
import type { HttpClient } from "../fetch/http-fetcher";
import type { ClientRequestOptions } from "../network/tls-client";
import type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from "../network/transport";
import type { Pacer } from "../pacing/rate-limiter";
import type { RecordContext } from "../product/record";
import type { ErrorHandlingConfig, SiteConfig } from "../types/config";
import type { ProductRecord } from "../types/product";
import type { Logger } from "../utils/logger";
import type { Sleep } from "../utils/sleep";

export const silentLogger = (): Logger => pino({ level: "silent" });

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** Logger whose JSON lines are kept for assertions */
export function memoryLogger(): { logger: Logger; lines: LogLine[]; messages: (level?: number) => string[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    },
  );
  const messages = (level?: number) => lines.filter((l) => level == null || l.level === level).map((l) => l.msg);
  return { logger, lines, messages };
}

export const WARN = 40;

export interface FakeClock {
  now: () => number;
  sleep: Sleep;
  slept: number[];
  advance(ms: number): void;
}

export function fakeClock(start = 1_700_000_000_000): FakeClock {
  let current = start;
  const slept: number[] = [];
  return {
    now: () => current,
    sleep: async (ms) => {
      slept.push(ms);
      current += Math.max(0, ms);
    },
    slept,
    advance(ms) {
      current += ms;
    },
  };
}

export const tempDir = (prefix = "grocery-scraper-"): string => mkdtempSync(path.join(tmpdir(), prefix));

export function makeRecord(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    store: "Test Grocer",
    site_slug: "testgrocer",
    store_id: null,
    source_url: "https://shop.test/p/1",
    scrape_ts: "2024-03-05T10:00:00.000Z",
    external_id: "SKU-1",
    name: "Whole Milk",
    brand: "Dairy Co",
    size_text: "2 L",
    price: 4.99,
    currency: "CAD",
    unit_price: 2.5,
    unit_price_uom: "L",
    image_url: null,
    category_path: "Dairy > Milk",
    availability: "in_stock",
    query_category: "milk",
    raw_source: null,
    ...overrides,
  };
}

export function makeContext(overrides: Partial<RecordContext> = {}): RecordContext {
  return {
    store: "Test Grocer",
    siteSlug: "testgrocer",
    storeId: null,
    currency: "CAD",
    queryCategory: "milk",
    pageUrl: "https://shop.test/search?q=milk",
    baseUrl: "https://shop.test",
    scrapedAt: new Date("2024-03-05T10:00:00.000Z"),
    ...overrides,
  };
}

/** Transport that records every request and answers from a callback */
export class RecordingTransport implements HttpTransport {
  readonly kind = "impersonate" as const;
  readonly requests: TransportRequest[] = [];
  closed = false;

  constructor(private readonly respond: (request: TransportRequest) => TransportResponse) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    return this.respond(request);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const okResponse = (body: string, url = "https://shop.test/"): TransportResponse => ({
  status: 200,
  url,
  headers: {},
  body,
});

export interface PacerCalls {
  waits: number;
  captchas: number;
  adaptive: number[];
}

/** Pacer that never sleeps and counts what it was asked to do */
export function fakePacer(): { pacer: Pacer; calls: PacerCalls } {
  const calls: PacerCalls = { waits: 0, captchas: 0, adaptive: [] };
  const pacer: Pacer = {
    wait: async () => {
      calls.waits++;
    },
    adaptiveWait: async (errorCount) => {
      calls.adaptive.push(errorCount);
    },
    reportCaptcha: () => {
      calls.captchas++;
    },
  };
  return { pacer, calls };
}

export const errorHandling = (overrides: Partial<ErrorHandlingConfig> = {}): ErrorHandlingConfig => ({
  maxRetries: 2,
  retryOnStatusCodes: [429, 500, 502, 503],
  rotateProxyOn403: true,
  rotateFingerprintOn403: true,
  backoffBase: 2,
  maxBackoffSeconds: 30,
  jitterRange: [0, 0],
  ...overrides,
});

/** A resolved config for "Test Grocer" at https://shop.test, with raw (snake_case) overrides */
export function siteConfig(overrides: Record<string, unknown> = {}): SiteConfig {
  return resolveSiteConfig({
    site_slug: "testgrocer",
    store_name: "Test Grocer",
    base_url: "https://shop.test",
    ...overrides,
  });
}

export const readFixture = (name: string): string => readFileSync(path.join(__dirname, "fixtures", name), "utf8");

export interface ClientCall {
  method: HttpMethod;
  url: string;
  options: ClientRequestOptions;
}

/** HttpClient answering every request from a callback */
export class CallbackClient implements HttpClient {
  readonly calls: ClientCall[] = [];
  rotations = 0;
  closed = false;

  constructor(private readonly respond: (call: ClientCall) => Partial<TransportResponse>) {}

  async request(method: HttpMethod, url: string, options: ClientRequestOptions = {}): Promise<TransportResponse> {
    const call = { method, url, options };
    this.calls.push(call);
    return { status: 200, url, headers: {}, body: "", ...this.respond(call) };
  }

  rotateFingerprint(): string {
    this.rotations++;
    return "chrome_117";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
