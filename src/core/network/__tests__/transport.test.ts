import { gzipSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import { TransientNetworkError } from "../../errors";
import { resolveFingerprint } from "../fingerprints";
import { classifyNetworkError, decodeBody, tlsConnectOptions } from "../transport";

describe("tlsConnectOptions", () => {
  it("carries the profile's cipher, signature and curve lists", () => {
    const { tls } = resolveFingerprint("firefox_120");
    expect(tlsConnectOptions(tls)).toEqual({
      ciphers: tls.ciphers,
      sigalgs: tls.sigalgs,
      ecdhCurve: "X25519:P-256:P-384:P-521",
      minVersion: "TLSv1.2",
    });
  });

  it("uses a different cipher order per browser family", () => {
    const chrome = tlsConnectOptions(resolveFingerprint("chrome_120").tls);
    const firefox = tlsConnectOptions(resolveFingerprint("firefox_120").tls);
    expect(chrome.ciphers.split(":")[1]).toBe("TLS_AES_256_GCM_SHA384");
    expect(firefox.ciphers.split(":")[1]).toBe("TLS_CHACHA20_POLY1305_SHA256");
  });
});

describe("decodeBody", () => {
  it("inflates gzip bodies and passes plain ones through", () => {
    expect(decodeBody(gzipSync(Buffer.from("<html>ok</html>")), "gzip")).toBe("<html>ok</html>");
    expect(decodeBody(Buffer.from("plain"), undefined)).toBe("plain");
  });
});

describe("classifyNetworkError", () => {
  it("wraps connection resets found on the cause chain", () => {
    const error = new Error("fetch failed", { cause: { code: "ECONNRESET" } });
    const classified = classifyNetworkError(error, "https://shop.test/");
    expect(classified).toBeInstanceOf(TransientNetworkError);
  });

  it("passes other errors through", () => {
    const error = new RangeError("bad header");
    expect(classifyNetworkError(error, "https://shop.test/")).toBe(error);
  });
});
