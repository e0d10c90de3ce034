/**
 * Fingerprint-rotating HTTP client
 */

import type { TlsConfig } from "../types/config";
import { EXECUTION_CONSTANTS } from "../constants";
import type { Logger } from "../utils/logger";
import { errorMeta } from "../utils/logger";
import { FINGERPRINT_POOL, resolveFingerprint, type FingerprintProfile } from "./fingerprints";
import { mergeHeaders, orderHeaders, type HeaderList } from "./header-order";
import type { ProxyManager } from "./proxy-manager";
import {
  ImpersonatingTransport,
  PassthroughTransport,
  assertTlsProfileSupported,
  type HttpMethod,
  type HttpTransport,
  type TransportResponse,
} from "./transport";

export interface ClientRequestOptions {
  headers?: Record<string, string>;
  body?: string;
  /** Serialized as the body with a JSON content type */
  json?: unknown;
  timeoutMs?: number;
}

export interface FingerprintClientOptions {
  logger: Logger;
  /** Site header set, sent on every request */
  baseHeaders?: Record<string, string>;
  proxyManager?: ProxyManager;
  random?: () => number;
  /** Overrides transport selection (tests) */
  transport?: HttpTransport;
}

export class FingerprintClient {
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly baseHeaders: Record<string, string>;
  private readonly proxyManager: ProxyManager | undefined;
  private readonly transport: HttpTransport;
  private current: FingerprintProfile;
  private fallbackIndex = 0;

  constructor(
    private readonly config: TlsConfig,
    options: FingerprintClientOptions,
  ) {
    this.logger = options.logger.child({ component: "tls-client" });
    this.random = options.random ?? Math.random;
    this.baseHeaders = options.baseHeaders ?? {};
    this.proxyManager = options.proxyManager;
    this.current = resolveFingerprint(this.initialIdentifier());
    this.transport = options.transport ?? this.selectTransport();
    this.logger.info(
      { fingerprint: this.current.identifier, transport: this.transport.kind },
      "HTTP client ready",
    );
  }

  private initialIdentifier(): string {
    if (!this.config.randomizeFingerprint) return this.config.clientIdentifier;
    const choices = [this.config.clientIdentifier, ...this.config.fallbackIdentifiers];
    return choices[Math.floor(this.random() * choices.length)];
  }

  private selectTransport(): HttpTransport {
    if (this.config.transport === "passthrough") return new PassthroughTransport();
    try {
      assertTlsProfileSupported(this.current.tls);
      return new ImpersonatingTransport();
    } catch (error) {
      this.logger.warn(
        errorMeta(error, { fingerprint: this.current.identifier }),
        "Impersonating transport unavailable, falling back to pass-through",
      );
      return new PassthroughTransport();
    }
  }

  get identifier(): string {
    return this.current.identifier;
  }

  get userAgent(): string {
    return this.current.userAgent;
  }

  get transportKind(): HttpTransport["kind"] {
    return this.transport.kind;
  }

  /** Next configured fallback; once those are used up, a random pick from the full pool */
  rotateFingerprint(): string {
    const previous = this.current.identifier;
    let next: string;
    if (this.fallbackIndex < this.config.fallbackIdentifiers.length) {
      next = this.config.fallbackIdentifiers[this.fallbackIndex++];
    } else {
      next = FINGERPRINT_POOL[Math.floor(this.random() * FINGERPRINT_POOL.length)];
      this.fallbackIndex = 0;
    }
    this.current = resolveFingerprint(next);
    this.logger.info({ from: previous, to: next }, "Rotated TLS fingerprint");
    return next;
  }

  /** Fingerprint headers, then site headers, then per-call headers, in browser order */
  buildHeaders(extra: Record<string, string> = {}): HeaderList {
    return orderHeaders(
      mergeHeaders({ "User-Agent": this.current.userAgent }, this.current.clientHints, this.baseHeaders, extra),
    );
  }

  async request(method: HttpMethod, url: string, options: ClientRequestOptions = {}): Promise<TransportResponse> {
    let body = options.body;
    const extra = { ...options.headers };
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      extra["Content-Type"] = "application/json";
    }
    return this.transport.send({
      method,
      url,
      headers: this.buildHeaders(extra),
      body,
      timeoutMs: options.timeoutMs ?? EXECUTION_CONSTANTS.DEFAULT_TIMEOUT_MS,
      proxyUrl: this.proxyManager?.getProxyUrl() ?? null,
      fingerprint: this.current,
    });
  }

  get(url: string, options?: ClientRequestOptions): Promise<TransportResponse> {
    return this.request("GET", url, options);
  }

  post(url: string, options?: ClientRequestOptions): Promise<TransportResponse> {
    return this.request("POST", url, options);
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}
