import pino from "pino";
import pretty from "pino-pretty";
import type { Logger } from "pino";

export type { Logger } from "pino";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerOptions {
  level?: LogLevelName;
  /** Plain-text copy of every line (no colors) */
  logFile?: string | null;
  /** Colorized console output; JSON lines when false */
  pretty?: boolean;
  /** Replaces the console sink, e.g. an in-memory stream in tests */
  destination?: pino.DestinationStream;
}

export interface LogMeta {
  site?: string;
  url?: string;
  page?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

const CLI_LEVELS: Record<string, LogLevelName> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  WARN: "warn",
  ERROR: "error",
};

/** Maps DEBUG|INFO|WARNING|ERROR (case-insensitive) to a pino level */
export function parseLogLevel(value: string | undefined, fallback: LogLevelName = "info"): LogLevelName {
  if (!value) return fallback;
  return CLI_LEVELS[value.toUpperCase()] ?? fallback;
}

/**
 * Creates the run's logger. Sinks: console (pretty or JSON) plus an optional
 * dated plain-text file, joined with pino.multistream.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  if (level === "silent") return pino({ level });

  const streams: pino.StreamEntry[] = [];
  if (options.destination) {
    streams.push({ level, stream: options.destination });
  } else if (options.pretty === false) {
    streams.push({ level, stream: pino.destination(1) });
  } else {
    streams.push({
      level,
      stream: pretty({
        colorize: true,
        translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
        ignore: "pid,hostname",
      }),
    });
  }

  if (options.logFile) {
    streams.push({
      level,
      stream: pretty({
        colorize: false,
        destination: options.logFile,
        mkdir: true,
        sync: true,
        translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
        ignore: "pid,hostname",
      }),
    });
  }

  return pino(
    { level, timestamp: pino.stdTimeFunctions.isoTime },
    pino.multistream(streams),
  );
}

/** Error fields in the shape every component logs them */
export function errorMeta(error: unknown, meta: LogMeta = {}): LogMeta {
  if (error instanceof Error) {
    return { ...meta, error: error.message, errorName: error.name, stack: error.stack };
  }
  return { ...meta, error: String(error) };
}

export function flushLogger(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}
