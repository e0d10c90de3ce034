import { describe, expect, it } from "vitest";
import { RecordingTransport, okResponse, silentLogger } from "../../__tests__/helpers";
import { ConfigError } from "../../errors";
import type { TlsConfig } from "../../types/config";
import { resolveFingerprint } from "../fingerprints";
import { ProxyManager } from "../proxy-manager";
import { FingerprintClient } from "../tls-client";

const tls: TlsConfig = {
  clientIdentifier: "chrome_120",
  fallbackIdentifiers: ["firefox_120", "safari_16_0"],
  randomizeFingerprint: false,
  transport: "impersonate",
};

function client(overrides: Partial<TlsConfig> = {}, random = () => 0) {
  const transport = new RecordingTransport(() => okResponse("<html></html>"));
  const instance = new FingerprintClient(
    { ...tls, ...overrides },
    {
      logger: silentLogger(),
      baseHeaders: { "Accept-Language": "en-CA", Accept: "text/html" },
      random,
      transport,
    },
  );
  return { transport, client: instance };
}

describe("FingerprintClient", () => {
  it("sends fingerprint, site and call headers in browser order", async () => {
    const { transport, client: http } = client();
    await http.get("https://shop.test/search", { headers: { Referer: "https://shop.test/" } });

    const [request] = transport.requests;
    expect(request.headers.map(([name]) => name)).toEqual([
      "sec-ch-ua",
      "sec-ch-ua-mobile",
      "sec-ch-ua-platform",
      "User-Agent",
      "Accept",
      "Referer",
      "Accept-Language",
    ]);
    expect(request.fingerprint.identifier).toBe("chrome_120");
    expect(request.proxyUrl).toBeNull();
  });

  it("serializes json bodies with a content type", async () => {
    const { transport, client: http } = client();
    await http.post("https://search.test/q", { json: { query: "milk" } });
    const [request] = transport.requests;
    expect(request.method).toBe("POST");
    expect(request.body).toBe('{"query":"milk"}');
    expect(request.headers).toContainEqual(["Content-Type", "application/json"]);
  });

  it("rotates through the fallbacks, then picks from the full pool", () => {
    const { client: http } = client({}, () => 0);
    expect(http.rotateFingerprint()).toBe("firefox_120");
    expect(http.userAgent).toBe(resolveFingerprint("firefox_120").userAgent);
    expect(http.rotateFingerprint()).toBe("safari_16_0");
    expect(http.rotateFingerprint()).toBe("chrome_120");
    expect(http.rotateFingerprint()).toBe("firefox_120");
  });

  it("starts from a random configured identity when randomizing", () => {
    const { client: http } = client({ randomizeFingerprint: true }, () => 0.99);
    expect(http.identifier).toBe("safari_16_0");
  });

  it("routes through the current proxy", async () => {
    const proxyManager = new ProxyManager(
      {
        enabled: true,
        source: "list",
        envVar: "PROXY_URL",
        filePath: null,
        proxies: ["http://proxy-a.test:8000"],
        rotationStrategy: "round_robin",
        maxFailuresBeforeRotate: 3,
      },
      { logger: silentLogger() },
    );
    const transport = new RecordingTransport(() => okResponse(""));
    const http = new FingerprintClient(tls, { logger: silentLogger(), proxyManager, transport });
    await http.get("https://shop.test/");
    expect(transport.requests[0].proxyUrl).toBe("http://proxy-a.test:8000");
  });

  it("closes its transport", async () => {
    const { transport, client: http } = client();
    await http.close();
    expect(transport.closed).toBe(true);
  });
});

describe("resolveFingerprint", () => {
  it("rejects identifiers outside the pool", () => {
    expect(() => resolveFingerprint("netscape_4")).toThrow(ConfigError);
  });

  it("gives chromium identities client hints", () => {
    const profile = resolveFingerprint("chrome_117");
    expect(profile.family).toBe("chromium");
    expect(profile.clientHints["sec-ch-ua"]).toBe('"Not_A Brand";v="8", "Chromium";v="117", "Google Chrome";v="117"');
  });
});
