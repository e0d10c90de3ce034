/**
 * Human-like pacing and input on a page
 */

import type { Page } from "playwright";
import { uniform, type Sleep } from "../utils/sleep";

export interface HumanOptions {
  random: () => number;
  sleep: Sleep;
  signal?: AbortSignal;
}

export function humanDelay(opts: HumanOptions, minMs: number, maxMs: number): Promise<void> {
  return opts.sleep(uniform(minMs, maxMs, opts.random), opts.signal);
}

/** Moves the pointer somewhere inside the viewport, away from the edges */
export async function randomMouseMove(page: Page, opts: HumanOptions): Promise<void> {
  const viewport = page.viewportSize();
  if (!viewport) return;
  const x = uniform(100, Math.max(100, viewport.width - 100), opts.random);
  const y = uniform(100, Math.max(100, viewport.height - 100), opts.random);
  await page.mouse.move(x, y, { steps: 5 + Math.floor(opts.random() * 10) });
  await humanDelay(opts, 100, 300);
}

/** A few wheel steps down, sometimes a bit back up */
export async function scrollPage(page: Page, opts: HumanOptions, steps = 3): Promise<void> {
  for (let i = 0; i < steps; i++) {
    await page.mouse.wheel(0, uniform(300, 700, opts.random));
    await humanDelay(opts, 400, 1_000);
  }
  if (opts.random() < 0.3) {
    await page.mouse.wheel(0, -uniform(200, 600, opts.random));
    await humanDelay(opts, 500, 1_500);
  }
}

export async function typeLikeHuman(page: Page, selector: string, text: string, opts: HumanOptions): Promise<void> {
  const box = page.locator(selector).first();
  await box.click();
  await humanDelay(opts, 300, 700);
  await box.pressSequentially(text, { delay: uniform(50, 150, opts.random) });
  await humanDelay(opts, 500, 1_000);
}
