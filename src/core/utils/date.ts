/**
 * Date formatting utilities
 */

/** ISO-8601 UTC with a Z suffix */
export function utcIso(date: Date = new Date()): string {
  return date.toISOString();
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** Sortable stamp for backup names, ex: 20250102_030405_678 (UTC) */
export function compactStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`
  );
}

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

/** Local-date stamp for log files, ex: 2025_march_07 */
export function logDateStamp(date: Date): string {
  return `${date.getFullYear()}_${MONTHS[date.getMonth()]}_${pad(date.getDate())}`;
}

/**
 * Formats a duration in seconds to a human-readable string
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(sec: number): string {
  const s = Math.max(0, Math.floor(sec));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}
