/**
 * Dated log files and their archive rotation
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { logDateStamp } from "./date";

export function datedLogFileName(siteSlug: string, date: Date): string {
  return `${siteSlug}_${logDateStamp(date)}.log`;
}

/**
 * Moves this site's log files from earlier days into the archive directory.
 * Today's file stays where it is. Returns the names moved.
 */
export async function rotateSiteLogs(
  siteSlug: string,
  logsDir: string,
  archiveDir: string,
  today: Date = new Date(),
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(logsDir);
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const current = datedLogFileName(siteSlug, today);
  const stale = entries.filter(
    (name) => name.startsWith(`${siteSlug}_`) && name.endsWith(".log") && name !== current,
  );
  if (stale.length === 0) return [];

  await fs.mkdir(archiveDir, { recursive: true });
  for (const name of stale) {
    await fs.rename(path.join(logsDir, name), path.join(archiveDir, name));
  }
  return stale;
}

export function isMissing(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
  );
}
