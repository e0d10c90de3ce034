/**
 * Retry with exponential backoff. The single place backoff math lives.
 */

import { TransientNetworkError } from "../errors";
import type { Logger } from "./logger";
import { errorMeta } from "./logger";
import { sleep as defaultSleep, uniform, type Sleep } from "./sleep";

export interface RetryOptions {
  maxRetries: number;
  /** Delay before retry n (0-based) is backoffBase^n seconds */
  backoffBase?: number;
  maxBackoffMs?: number;
  /** Extra uniform jitter, seconds */
  jitterRange?: readonly [number, number];
  retryOn?: (error: unknown) => boolean;
  label?: string;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
}

type ErrorClass = abstract new (...args: never[]) => Error;

/** Predicate matching any of the given error classes */
export function retryOnErrors(...classes: ErrorClass[]): (error: unknown) => boolean {
  return (error) => classes.some((cls) => error instanceof cls);
}

export const isTransientError = retryOnErrors(TransientNetworkError);

export function backoffDelayMs(
  attempt: number,
  options: Pick<RetryOptions, "backoffBase" | "maxBackoffMs" | "jitterRange" | "random">,
): number {
  const base = options.backoffBase ?? 2;
  const exp = Math.pow(base, attempt) * 1000;
  const capped = options.maxBackoffMs != null ? Math.min(exp, options.maxBackoffMs) : exp;
  const [lo, hi] = options.jitterRange ?? [0, 0];
  const jitter = hi > 0 ? uniform(lo, hi, options.random) * 1000 : 0;
  return Math.round(capped + jitter);
}

/**
 * Runs `operation`, retrying matched errors up to `maxRetries` times.
 * Unmatched errors and the last matched one are rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    retryOn = isTransientError,
    label = "operation",
    logger,
    sleep = defaultSleep,
    signal,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!retryOn(error) || attempt >= maxRetries) throw error;

      const delayMs = backoffDelayMs(attempt, options);
      logger?.warn(
        errorMeta(error, { attempt: attempt + 1, maxRetries, delayMs }),
        `${label} failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delayMs}ms`,
      );
      await sleep(delayMs, signal);
    }
  }
}
