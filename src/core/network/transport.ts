/**
 * HTTP transports. The impersonating one shapes the TLS handshake per
 * fingerprint and sends headers in list form so their order survives; the
 * pass-through one is plain fetch with the same contract.
 */

import { createSecureContext } from "node:tls";
import { brotliDecompressSync, gunzipSync, inflateSync } from "node:zlib";
import { Agent, ProxyAgent, fetch, request, type Dispatcher } from "undici";
import { TransientNetworkError } from "../errors";
import type { TransportKind } from "../types/config";
import type { FingerprintProfile, TlsProfile } from "./fingerprints";
import { flattenHeaders, type HeaderList } from "./header-order";

export type HttpMethod = "GET" | "POST";

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HeaderList;
  body?: string;
  timeoutMs: number;
  proxyUrl: string | null;
  fingerprint: FingerprintProfile;
}

export interface TransportResponse {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface HttpTransport {
  readonly kind: TransportKind;
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
  "UND_ERR_ABORTED",
]);

function errorCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null) return null;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error) return errorCode(error.cause);
  return null;
}

/** Network-level failures become TransientNetworkError; anything else passes through */
export function classifyNetworkError(error: unknown, url: string): unknown {
  const code = errorCode(error);
  if (code && TRANSIENT_CODES.has(code)) {
    return new TransientNetworkError(`${code} for ${url}`, undefined, { cause: error });
  }
  if (error instanceof Error && /timeout|fetch failed|socket/i.test(error.message)) {
    return new TransientNetworkError(`${error.message} for ${url}`, undefined, { cause: error });
  }
  return error;
}

function flattenResponseHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (v !== undefined) out[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
  }
  return out;
}

export function decodeBody(buffer: Buffer, encoding: string | undefined): string {
  switch ((encoding ?? "").trim().toLowerCase()) {
    case "gzip":
    case "x-gzip":
      return gunzipSync(buffer).toString("utf8");
    case "br":
      return brotliDecompressSync(buffer).toString("utf8");
    case "deflate":
      return inflateSync(buffer).toString("utf8");
    default:
      return buffer.toString("utf8");
  }
}

/** Throws when this OpenSSL build rejects the profile's cipher/curve/sigalg lists */
export function assertTlsProfileSupported(tls: TlsProfile): void {
  createSecureContext({ ciphers: tls.ciphers, sigalgs: tls.sigalgs, ecdhCurve: tls.ecdhCurve });
}

/**
 * Connect options for a fingerprint's ClientHello. ALPN is left to undici,
 * whose connector always sets it to http/1.1.
 */
export function tlsConnectOptions(tls: TlsProfile) {
  return {
    ciphers: tls.ciphers,
    sigalgs: tls.sigalgs,
    ecdhCurve: tls.ecdhCurve,
    minVersion: "TLSv1.2" as const,
  };
}

export class ImpersonatingTransport implements HttpTransport {
  readonly kind = "impersonate" as const;
  private readonly dispatchers = new Map<string, Dispatcher>();

  private dispatcherFor(fingerprint: FingerprintProfile, proxyUrl: string | null): Dispatcher {
    const key = `${fingerprint.family}|${proxyUrl ?? ""}`;
    const existing = this.dispatchers.get(key);
    if (existing) return existing;

    const tls = tlsConnectOptions(fingerprint.tls);
    const dispatcher = proxyUrl
      ? new ProxyAgent({ uri: proxyUrl, requestTls: tls })
      : new Agent({ connect: tls });
    this.dispatchers.set(key, dispatcher);
    return dispatcher;
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    try {
      const res = await request(req.url, {
        method: req.method,
        headers: flattenHeaders(req.headers),
        body: req.body,
        dispatcher: this.dispatcherFor(req.fingerprint, req.proxyUrl),
        headersTimeout: req.timeoutMs,
        bodyTimeout: req.timeoutMs,
        maxRedirections: 5,
      });
      const headers = flattenResponseHeaders(res.headers);
      const buffer = Buffer.from(await res.body.arrayBuffer());
      return {
        status: res.statusCode,
        url: req.url,
        headers,
        body: decodeBody(buffer, headers["content-encoding"]),
      };
    } catch (error) {
      throw classifyNetworkError(error, req.url);
    }
  }

  async close(): Promise<void> {
    const all = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.all(all.map((d) => d.close()));
  }
}

export class PassthroughTransport implements HttpTransport {
  readonly kind = "passthrough" as const;
  private readonly proxies = new Map<string, ProxyAgent>();

  async send(req: TransportRequest): Promise<TransportResponse> {
    let dispatcher: ProxyAgent | undefined;
    if (req.proxyUrl) {
      dispatcher = this.proxies.get(req.proxyUrl);
      if (!dispatcher) {
        dispatcher = new ProxyAgent(req.proxyUrl);
        this.proxies.set(req.proxyUrl, dispatcher);
      }
    }
    try {
      const res = await fetch(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        dispatcher,
        redirect: "follow",
        signal: AbortSignal.timeout(req.timeoutMs),
      });
      const headers: Record<string, string> = {};
      res.headers.forEach((value, name) => {
        headers[name] = value;
      });
      return { status: res.status, url: res.url || req.url, headers, body: await res.text() };
    } catch (error) {
      throw classifyNetworkError(error, req.url);
    }
  }

  async close(): Promise<void> {
    const all = [...this.proxies.values()];
    this.proxies.clear();
    await Promise.all(all.map((d) => d.close()));
  }
}
