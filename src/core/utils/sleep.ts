import { InterruptedError } from "../errors";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type Clock = () => number;

/** setTimeout-backed sleep; only the abort signal cuts it short */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedError());
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(new InterruptedError());
    };
    timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const systemClock: Clock = () => Date.now();

/** Uniform pick in [min, max] */
export function uniform(min: number, max: number, random: () => number = Math.random): number {
  const hi = Math.max(min, max);
  return min + random() * (hi - min);
}
