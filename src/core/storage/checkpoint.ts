/**
 * Per-site resume state: seen dedup keys plus cumulative stats
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { CheckpointState, RunStats } from "../types/checkpoint";
import { utcIso } from "../utils/date";
import { asNumber, isRecord } from "../utils/json";
import { isMissing } from "../utils/log-files";
import type { Logger } from "../utils/logger";
import { errorMeta } from "../utils/logger";

export const STAT_KEYS: ReadonlyArray<keyof RunStats> = [
  "total_scraped",
  "duplicates_skipped",
  "invalid_records",
  "pages_processed",
  "errors",
];

export function emptyStats(): RunStats {
  return {
    total_scraped: 0,
    duplicates_skipped: 0,
    invalid_records: 0,
    pages_processed: 0,
    errors: 0,
  };
}

function readStats(value: unknown): RunStats {
  const stats = emptyStats();
  if (!isRecord(value)) return stats;
  for (const key of STAT_KEYS) {
    stats[key] = asNumber(value[key]) ?? 0;
  }
  return stats;
}

/** Narrows a parsed checkpoint file; null when its shape is wrong */
export function parseCheckpoint(value: unknown): CheckpointState | null {
  if (!isRecord(value) || !Array.isArray(value.seen_keys)) return null;
  return {
    seen_keys: value.seen_keys.filter((k): k is string => typeof k === "string"),
    stats: readStats(value.stats),
    last_updated: typeof value.last_updated === "string" ? value.last_updated : "",
  };
}

export class CheckpointManager {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    readonly file: string,
    options: { logger: Logger; now?: () => Date },
  ) {
    this.logger = options.logger.child({ component: "checkpoint" });
    this.now = options.now ?? (() => new Date());
  }

  /** Overwrites the file (write-then-rename); last writer wins */
  async save(seenKeys: Iterable<string>, stats: RunStats): Promise<CheckpointState> {
    const state: CheckpointState = {
      seen_keys: [...seenKeys],
      stats: { ...stats },
      last_updated: utcIso(this.now()),
    };
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(state, null, 2), "utf8");
    await fs.rename(tmp, this.file);
    this.logger.info({ keys: state.seen_keys.length, file: this.file }, "Checkpoint saved");
    return state;
  }

  /** null when there is no checkpoint or it cannot be read */
  async load(): Promise<CheckpointState | null> {
    let text: string;
    try {
      text = await fs.readFile(this.file, "utf8");
    } catch (error) {
      if (isMissing(error)) return null;
      this.logger.warn(errorMeta(error, { file: this.file }), "Could not read checkpoint");
      return null;
    }
    try {
      const state = parseCheckpoint(JSON.parse(text));
      if (!state) {
        this.logger.warn({ file: this.file }, "Checkpoint has an unexpected shape, ignoring it");
        return null;
      }
      this.logger.info({ keys: state.seen_keys.length, lastUpdated: state.last_updated }, "Checkpoint loaded");
      return state;
    } catch (error) {
      this.logger.warn(errorMeta(error, { file: this.file }), "Checkpoint is not valid JSON, ignoring it");
      return null;
    }
  }

  async clear(): Promise<boolean> {
    try {
      await fs.unlink(this.file);
      this.logger.info({ file: this.file }, "Checkpoint cleared");
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}
