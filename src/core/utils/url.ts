/**
 * URL manipulation utilities
 */

/**
 * Resolves a relative or absolute location against a base URL
 * @returns Absolute URL or null if it cannot be parsed
 */
export function resolveLocation(baseUrl: string, loc: string | null | undefined): string | null {
  if (!loc) return null;
  try {
    if (/^https?:/i.test(loc)) return new URL(loc).toString();
    if (loc.startsWith("//")) return new URL(`https:${loc}`).toString();
    return new URL(loc, baseUrl).toString();
  } catch {
    return null;
  }
}

/** Returns `url` with the given query parameters set (null deletes) */
export function withQuery(url: string, params: Record<string, string | number | null>): string {
  const u = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value == null) u.searchParams.delete(key);
    else u.searchParams.set(key, String(value));
  }
  return u.toString();
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname;
  } catch {
    return null;
  }
}

/** Hides user:password in proxy URLs before they reach a log line */
export function maskCredentials(url: string): string {
  return url.replace(/\/\/([^/@]+)@/, "//***@");
}
