/**
 * Dedup + append path for product records
 */

import { dedupeKey } from "../product/record";
import type { RunStats } from "../types/checkpoint";
import type { ProductRecord, RecordCandidate } from "../types/product";
import type { Logger } from "../utils/logger";
import { validateRecord } from "../validation/product-validator";
import { emptyStats } from "./checkpoint";
import { JsonlWriter } from "./jsonl";

export interface RecordStoreOptions {
  outputFile: string;
  logger: Logger;
}

export class RecordStore {
  private readonly seen = new Set<string>();
  private readonly writer: JsonlWriter;
  private readonly logger: Logger;
  readonly stats: RunStats = emptyStats();

  constructor(options: RecordStoreOptions) {
    this.writer = new JsonlWriter(options.outputFile);
    this.logger = options.logger.child({ component: "record-store" });
  }

  /** Loads keys (and optionally cumulative stats) from a checkpoint */
  seed(keys: Iterable<string>, stats?: RunStats): void {
    for (const key of keys) this.seen.add(key);
    if (stats) Object.assign(this.stats, stats);
  }

  get seenKeys(): ReadonlySet<string> {
    return this.seen;
  }

  hasSeen(key: string): boolean {
    return this.seen.has(key);
  }

  /** Validate → dedupe; the records that should be written, with their keys */
  private filter(candidates: readonly RecordCandidate[]): Array<{ key: string; record: ProductRecord }> {
    const accepted: Array<{ key: string; record: ProductRecord }> = [];
    const batchKeys = new Set<string>();
    for (const candidate of candidates) {
      if (!validateRecord(candidate, this.logger)) {
        this.stats.invalid_records++;
        continue;
      }
      const key = dedupeKey(candidate);
      if (this.seen.has(key) || batchKeys.has(key)) {
        this.stats.duplicates_skipped++;
        continue;
      }
      batchKeys.add(key);
      accepted.push({ key, record: candidate });
    }
    return accepted;
  }

  private commit(accepted: Array<{ key: string; record: ProductRecord }>): void {
    for (const { key } of accepted) this.seen.add(key);
    this.stats.total_scraped += accepted.length;
  }

  /** True when the record was written */
  async saveRecord(candidate: RecordCandidate): Promise<boolean> {
    const accepted = this.filter([candidate]);
    if (accepted.length === 0) return false;
    await this.writer.append([accepted[0].record]);
    this.commit(accepted);
    return true;
  }

  /** Same filter as saveRecord, then a single append; returns how many were written */
  async saveRecordsBatch(candidates: readonly RecordCandidate[]): Promise<number> {
    const accepted = this.filter(candidates);
    if (accepted.length === 0) return 0;
    await this.writer.append(accepted.map((a) => a.record));
    this.commit(accepted);
    this.logger.info({ count: accepted.length }, `Batch saved ${accepted.length} records`);
    return accepted.length;
  }

  recordPage(): void {
    this.stats.pages_processed++;
  }

  recordError(): void {
    this.stats.errors++;
  }
}
