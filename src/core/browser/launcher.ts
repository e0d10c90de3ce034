/**
 * Browser launching and configuration
 */

import { chromium, type Browser } from "playwright";
import { BROWSER_CONSTANTS } from "../constants";

export interface LaunchOptions {
  headless: boolean;
  args?: readonly string[];
}

/** Splits credentials out of a proxy URL the way Playwright wants them */
export function playwrightProxy(proxyUrl: string): { server: string; username?: string; password?: string } {
  const u = new URL(proxyUrl);
  const server = `${u.protocol}//${u.host}`;
  if (!u.username) return { server };
  return { server, username: decodeURIComponent(u.username), password: decodeURIComponent(u.password) };
}

/**
 * Launches a Chromium browser instance with automation flags disabled
 */
export async function launchBrowser(options: LaunchOptions): Promise<Browser> {
  return await chromium.launch({
    headless: options.headless,
    args: [...(options.args ?? BROWSER_CONSTANTS.LAUNCH_ARGS)],
  });
}
