/**
 * Browser header ordering. WAFs key on the order headers arrive in, not
 * just their presence.
 */

export type HeaderList = Array<[string, string]>;

export const HEADER_PRIORITY = [
  "host",
  "connection",
  "content-length",
  "sec-ch-ua",
  "sec-ch-ua-mobile",
  "sec-ch-ua-platform",
  "upgrade-insecure-requests",
  "user-agent",
  "accept",
  "content-type",
  "sec-fetch-site",
  "sec-fetch-mode",
  "sec-fetch-user",
  "sec-fetch-dest",
  "referer",
  "origin",
  "accept-encoding",
  "accept-language",
  "cookie",
  "x-algolia-api-key",
  "x-algolia-application-id",
  "x-algolia-agent",
];

const RANK = new Map(HEADER_PRIORITY.map((name, i) => [name, i]));

/**
 * Merges header sets left to right. A later value replaces an earlier one
 * with the same name (case-insensitive) but keeps the earlier position.
 */
export function mergeHeaders(...sets: Array<Record<string, string> | HeaderList>): HeaderList {
  const out: HeaderList = [];
  const index = new Map<string, number>();
  for (const set of sets) {
    const entries = Array.isArray(set) ? set : Object.entries(set);
    for (const [name, value] of entries) {
      const key = name.toLowerCase();
      const at = index.get(key);
      if (at === undefined) {
        index.set(key, out.length);
        out.push([name, value]);
      } else {
        out[at] = [out[at][0], value];
      }
    }
  }
  return out;
}

/** Known headers in browser priority order, the rest after them in their given order */
export function orderHeaders(headers: HeaderList): HeaderList {
  const known: Array<{ rank: number; entry: [string, string] }> = [];
  const rest: HeaderList = [];
  for (const entry of headers) {
    const rank = RANK.get(entry[0].toLowerCase());
    if (rank === undefined) rest.push(entry);
    else known.push({ rank, entry });
  }
  known.sort((a, b) => a.rank - b.rank);
  return [...known.map((k) => k.entry), ...rest];
}

/** [k, v, k, v] form, which keeps order on the wire */
export function flattenHeaders(headers: HeaderList): string[] {
  return headers.flatMap(([name, value]) => [name, value]);
}
