/**
 * Error taxonomy
 */

export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScraperError";
  }
}

/** Missing or invalid site config; fatal before any state is written */
export class ConfigError extends ScraperError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Timeouts, resets, DNS failures and retryable status codes */
export class TransientNetworkError extends ScraperError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransientNetworkError";
  }
}

export class HttpStatusError extends ScraperError {
  constructor(
    public readonly status: number,
    public readonly url: string,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

export type BotDetectionReason = "status-403" | "captcha";

export class BotDetectionError extends ScraperError {
  constructor(
    public readonly reason: BotDetectionReason,
    public readonly url: string,
    public readonly detections: number,
  ) {
    super(`Bot detection (${reason}) persisted after ${detections} attempts for ${url}`);
    this.name = "BotDetectionError";
  }
}

/** Raised out of sleeps and loops once the process-level interrupt fires */
export class InterruptedError extends ScraperError {
  constructor() {
    super("Interrupted");
    this.name = "InterruptedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
