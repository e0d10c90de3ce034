/**
 * Session warm-up: homepage plus one or two casual pages before the target
 */

import { InterruptedError } from "../errors";
import type { Logger } from "../utils/logger";
import { errorMeta } from "../utils/logger";
import { resolveLocation } from "../utils/url";
import type { BrowserSession } from "./session";

export interface WarmupOptions {
  baseUrl: string;
  paths: readonly string[];
  random: () => number;
  logger: Logger;
}

/** One or two distinct paths, in random order */
export function pickWarmupPaths(paths: readonly string[], random: () => number): string[] {
  const pool = [...paths];
  const count = Math.min(pool.length, 1 + Math.floor(random() * 2));
  const picked: string[] = [];
  while (picked.length < count) {
    const [path] = pool.splice(Math.floor(random() * pool.length), 1);
    picked.push(path);
  }
  return picked;
}

/** Failures are logged and the run carries on with the target page */
export async function warmupSession(session: BrowserSession, opts: WarmupOptions): Promise<string[]> {
  const visited: string[] = [];
  const targets = [opts.baseUrl, ...pickWarmupPaths(opts.paths, opts.random)];
  opts.logger.info({ pages: targets.length }, "Warming up session");
  try {
    for (const target of targets) {
      const url = resolveLocation(opts.baseUrl, target);
      if (!url) continue;
      await session.goto(url);
      if (visited.length === 0) await session.dismissPopups();
      await session.browseLikeHuman();
      visited.push(url);
    }
  } catch (error) {
    if (error instanceof InterruptedError) throw error;
    opts.logger.warn(errorMeta(error, { visited: visited.length }), "Warm-up interrupted by an error");
  }
  return visited;
}
