/**
 * Browser identities the HTTP client can present: user agent, client hints
 * and the TLS parameters that shape the ClientHello.
 */

import { ConfigError } from "../errors";

export const FINGERPRINT_POOL = [
  "chrome_120",
  "chrome_117",
  "chrome_116",
  "chrome_112",
  "chrome_111",
  "chrome_110",
  "chrome_109",
  "chrome_108",
  "chrome_107",
  "chrome_106",
  "chrome_105",
  "chrome_104",
  "chrome_103",
  "firefox_120",
  "firefox_117",
  "firefox_110",
  "firefox_108",
  "safari_ios_17_0",
  "safari_16_0",
  "safari_15_6_1",
  "edge_101",
  "edge_99",
  "opera_91",
  "opera_90",
  "opera_89",
] as const;

export type FingerprintId = (typeof FINGERPRINT_POOL)[number];

export type BrowserFamily = "chromium" | "firefox" | "safari";

export interface TlsProfile {
  ciphers: string;
  sigalgs: string;
  ecdhCurve: string;
}

export interface FingerprintProfile {
  identifier: string;
  family: BrowserFamily;
  userAgent: string;
  /** sec-ch-ua* headers; Chromium only */
  clientHints: Record<string, string>;
  tls: TlsProfile;
}

const TLS: Record<BrowserFamily, TlsProfile> = {
  chromium: {
    ciphers: [
      "TLS_AES_128_GCM_SHA256",
      "TLS_AES_256_GCM_SHA384",
      "TLS_CHACHA20_POLY1305_SHA256",
      "ECDHE-ECDSA-AES128-GCM-SHA256",
      "ECDHE-RSA-AES128-GCM-SHA256",
      "ECDHE-ECDSA-AES256-GCM-SHA384",
      "ECDHE-RSA-AES256-GCM-SHA384",
      "ECDHE-ECDSA-CHACHA20-POLY1305",
      "ECDHE-RSA-CHACHA20-POLY1305",
      "ECDHE-RSA-AES128-SHA",
      "ECDHE-RSA-AES256-SHA",
      "AES128-GCM-SHA256",
      "AES256-GCM-SHA384",
      "AES128-SHA",
      "AES256-SHA",
    ].join(":"),
    sigalgs: [
      "ecdsa_secp256r1_sha256",
      "rsa_pss_rsae_sha256",
      "rsa_pkcs1_sha256",
      "ecdsa_secp384r1_sha384",
      "rsa_pss_rsae_sha384",
      "rsa_pkcs1_sha384",
      "rsa_pss_rsae_sha512",
      "rsa_pkcs1_sha512",
    ].join(":"),
    ecdhCurve: "X25519:P-256:P-384",
  },
  firefox: {
    ciphers: [
      "TLS_AES_128_GCM_SHA256",
      "TLS_CHACHA20_POLY1305_SHA256",
      "TLS_AES_256_GCM_SHA384",
      "ECDHE-ECDSA-AES128-GCM-SHA256",
      "ECDHE-RSA-AES128-GCM-SHA256",
      "ECDHE-ECDSA-CHACHA20-POLY1305",
      "ECDHE-RSA-CHACHA20-POLY1305",
      "ECDHE-ECDSA-AES256-GCM-SHA384",
      "ECDHE-RSA-AES256-GCM-SHA384",
      "ECDHE-ECDSA-AES256-SHA",
      "ECDHE-ECDSA-AES128-SHA",
      "ECDHE-RSA-AES128-SHA",
      "ECDHE-RSA-AES256-SHA",
      "AES128-GCM-SHA256",
      "AES256-GCM-SHA384",
      "AES128-SHA",
      "AES256-SHA",
    ].join(":"),
    sigalgs: [
      "ecdsa_secp256r1_sha256",
      "ecdsa_secp384r1_sha384",
      "ecdsa_secp521r1_sha512",
      "rsa_pss_rsae_sha256",
      "rsa_pss_rsae_sha384",
      "rsa_pss_rsae_sha512",
      "rsa_pkcs1_sha256",
      "rsa_pkcs1_sha384",
      "rsa_pkcs1_sha512",
    ].join(":"),
    ecdhCurve: "X25519:P-256:P-384:P-521",
  },
  safari: {
    ciphers: [
      "TLS_AES_128_GCM_SHA256",
      "TLS_AES_256_GCM_SHA384",
      "TLS_CHACHA20_POLY1305_SHA256",
      "ECDHE-ECDSA-AES256-GCM-SHA384",
      "ECDHE-ECDSA-AES128-GCM-SHA256",
      "ECDHE-ECDSA-CHACHA20-POLY1305",
      "ECDHE-RSA-AES256-GCM-SHA384",
      "ECDHE-RSA-AES128-GCM-SHA256",
      "ECDHE-RSA-CHACHA20-POLY1305",
      "ECDHE-ECDSA-AES256-SHA384",
      "ECDHE-ECDSA-AES128-SHA256",
      "ECDHE-RSA-AES256-SHA384",
      "ECDHE-RSA-AES128-SHA256",
    ].join(":"),
    sigalgs: [
      "ecdsa_secp256r1_sha256",
      "rsa_pss_rsae_sha256",
      "rsa_pkcs1_sha256",
      "ecdsa_secp384r1_sha384",
      "rsa_pss_rsae_sha384",
      "rsa_pkcs1_sha384",
      "rsa_pss_rsae_sha512",
      "rsa_pkcs1_sha512",
    ].join(":"),
    ecdhCurve: "X25519:P-256:P-384:P-521",
  },
};

const WIN = "Windows NT 10.0; Win64; x64";

function chromiumHints(brands: Array<[string, string]>): Record<string, string> {
  return {
    "sec-ch-ua": brands.map(([b, v]) => `"${b}";v="${v}"`).join(", "),
    "sec-ch-ua-mobile": "?0",
    "sec-ch-ua-platform": '"Windows"',
  };
}

export function isKnownFingerprint(id: string): id is FingerprintId {
  return FINGERPRINT_POOL.some((known) => known === id);
}

/**
 * Expands an identifier such as "chrome_120" or "safari_ios_17_0"
 * @throws ConfigError for identifiers outside the pool
 */
export function resolveFingerprint(identifier: string): FingerprintProfile {
  if (!isKnownFingerprint(identifier)) {
    throw new ConfigError(`Unknown TLS client identifier "${identifier}"`);
  }
  const [browser, ...rest] = identifier.split("_");

  switch (browser) {
    case "chrome": {
      const v = rest[0];
      return {
        identifier,
        family: "chromium",
        userAgent: `Mozilla/5.0 (${WIN}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${v}.0.0.0 Safari/537.36`,
        clientHints: chromiumHints([["Not_A Brand", "8"], ["Chromium", v], ["Google Chrome", v]]),
        tls: TLS.chromium,
      };
    }
    case "edge": {
      const v = rest[0];
      return {
        identifier,
        family: "chromium",
        userAgent:
          `Mozilla/5.0 (${WIN}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${v}.0.0.0 ` +
          `Safari/537.36 Edg/${v}.0.0.0`,
        clientHints: chromiumHints([[" Not A;Brand", "99"], ["Chromium", v], ["Microsoft Edge", v]]),
        tls: TLS.chromium,
      };
    }
    case "opera": {
      const v = rest[0];
      const chromium = String(Number(v) + 14); // Opera N ships Chromium N+14
      return {
        identifier,
        family: "chromium",
        userAgent:
          `Mozilla/5.0 (${WIN}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${chromium}.0.0.0 ` +
          `Safari/537.36 OPR/${v}.0.0.0`,
        clientHints: chromiumHints([[".Not/A)Brand", "99"], ["Opera", v], ["Chromium", chromium]]),
        tls: TLS.chromium,
      };
    }
    case "firefox": {
      const v = rest[0];
      return {
        identifier,
        family: "firefox",
        userAgent: `Mozilla/5.0 (${WIN}; rv:${v}.0) Gecko/20100101 Firefox/${v}.0`,
        clientHints: {},
        tls: TLS.firefox,
      };
    }
    default: {
      // safari_16_0, safari_15_6_1, safari_ios_17_0
      const ios = rest[0] === "ios";
      const parts = ios ? rest.slice(1) : rest;
      const version = parts.join(".");
      const userAgent = ios
        ? `Mozilla/5.0 (iPhone; CPU iPhone OS ${parts.join("_")} like Mac OS X) AppleWebKit/605.1.15 ` +
          `(KHTML, like Gecko) Version/${version} Mobile/15E148 Safari/604.1`
        : `Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 ` +
          `(KHTML, like Gecko) Version/${version} Safari/605.1.15`;
      return { identifier, family: "safari", userAgent, clientHints: {}, tls: TLS.safari };
    }
  }
}
