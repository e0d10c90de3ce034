/**
 * Desktop identities a browser context can present
 */

export interface BrowserIdentity {
  name: string;
  userAgent: string;
  viewport: { width: number; height: number };
  platform: string;
  timezone: string;
  acceptLanguage: string;
}

export const BROWSER_IDENTITIES: readonly BrowserIdentity[] = [
  {
    name: "windows-10-desktop",
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    viewport: { width: 1920, height: 1080 },
    platform: "Win32",
    timezone: "America/Toronto",
    acceptLanguage: "en-CA,en-US;q=0.9,en;q=0.8",
  },
  {
    name: "windows-11-desktop",
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    viewport: { width: 2560, height: 1440 },
    platform: "Win32",
    timezone: "America/Vancouver",
    acceptLanguage: "en-CA;q=0.9,fr-CA;q=0.8,en-US;q=0.7",
  },
  {
    name: "macos-laptop",
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    viewport: { width: 1440, height: 900 },
    platform: "MacIntel",
    timezone: "America/Edmonton",
    acceptLanguage: "en-CA,en;q=0.9",
  },
  {
    name: "windows-laptop",
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    viewport: { width: 1366, height: 768 },
    platform: "Win32",
    timezone: "America/Winnipeg",
    acceptLanguage: "en-CA,fr-CA;q=0.9,en;q=0.8",
  },
];

/** Random identity, never `current` when there is another to pick */
export function pickIdentity(random: () => number, current?: BrowserIdentity | null): BrowserIdentity {
  const pool = current ? BROWSER_IDENTITIES.filter((i) => i.name !== current.name) : BROWSER_IDENTITIES;
  const choices = pool.length > 0 ? pool : BROWSER_IDENTITIES;
  return choices[Math.floor(random() * choices.length)];
}
