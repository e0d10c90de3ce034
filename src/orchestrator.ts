/**
 * Per-site scrape driver: init → (stores × pages) → shutdown
 */

import { promises as fs } from "node:fs";
import { ConfigError, InterruptedError } from "./core/errors";
import type { BackupManager } from "./core/storage/backup";
import { STAT_KEYS, type CheckpointManager } from "./core/storage/checkpoint";
import { exportJsonlToCsv } from "./core/storage/csv-export";
import type { RecordStore } from "./core/storage/record-store";
import type { StoreRotator } from "./core/stores/store-rotator";
import type { RunStats } from "./core/types/checkpoint";
import type { OutputFormat, SiteConfig, StoreLocation } from "./core/types/config";
import type { PaginationInfo } from "./core/types/extraction";
import type { PageRequest, PageResult, ScrapeMode, SiteAdapter } from "./core/types/site";
import { formatDuration } from "./core/utils/date";
import { isMissing } from "./core/utils/log-files";
import type { Logger } from "./core/utils/logger";
import { errorMeta } from "./core/utils/logger";
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from "./core/utils/sleep";

export interface ScrapeTarget {
  mode: ScrapeMode;
  /** Search term, category path or product URL */
  target: string;
}

export interface RunFlags {
  maxPages: number | null;
  outputFormat: OutputFormat;
  resume: boolean;
  clearCheckpoint: boolean;
  fresh: boolean;
}

export interface OrchestratorOptions extends RunFlags {
  config: SiteConfig;
  adapter: SiteAdapter;
  records: RecordStore;
  checkpoint: CheckpointManager;
  backup: BackupManager;
  rotator: StoreRotator;
  productsFile: string;
  csvFile: string;
  logger: Logger;
  clock?: Clock;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export interface RunSummary {
  stats: RunStats;
  elapsedSec: number;
  interrupted: boolean;
  /** Rows written to the CSV export, null when none was requested */
  csvRows: number | null;
}

/** True when pagination metadata says this was the last page */
export function isLastPage(pagination: PaginationInfo | null): boolean {
  if (!pagination) return false;
  if (pagination.hasMore === false) return true;
  return (
    pagination.currentPage != null && pagination.totalPages != null && pagination.currentPage >= pagination.totalPages
  );
}

export function formatStats(stats: RunStats, elapsedSec: number): string[] {
  const width = Math.max(...STAT_KEYS.map((k) => k.length));
  return [
    "=".repeat(40),
    "Run statistics",
    ...STAT_KEYS.map((key) => `  ${key.padEnd(width)}  ${stats[key]}`),
    `  ${"elapsed".padEnd(width)}  ${formatDuration(elapsedSec)}`,
    "=".repeat(40),
  ];
}

export class ScrapeOrchestrator {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger.child({ component: "orchestrator" });
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  private checkInterrupted(): void {
    if (this.options.signal?.aborted) throw new InterruptedError();
  }

  /** Pre-run backup, fresh-start clearing, checkpoint load */
  async init(): Promise<void> {
    const { backup, checkpoint, records, productsFile } = this.options;

    const saved = await backup.backupFile(productsFile);
    if (saved) this.logger.info({ backup: saved }, "Backed up previous output");

    if (this.options.fresh) {
      await removeIfPresent(productsFile);
      await checkpoint.clear();
      this.logger.info({ file: productsFile }, "Fresh start: cleared output and checkpoint");
      return;
    }
    if (this.options.clearCheckpoint) await checkpoint.clear();

    if (this.options.resume) {
      const state = await checkpoint.load();
      if (state) {
        records.seed(state.seen_keys, state.stats);
        this.logger.info({ keys: state.seen_keys.length }, "Resuming from checkpoint");
      } else {
        this.logger.info("No checkpoint to resume from, starting empty");
      }
    }
  }

  /** Search fans out over stores when rotation is on; other modes run once */
  storesFor(target: ScrapeTarget): Array<StoreLocation | null> {
    const { config, rotator } = this.options;
    if (target.mode !== "search" || !config.storeRotation.enabled) return [null];
    const stores = rotator.getStoresForQuery();
    return stores.length > 0 ? stores : [null];
  }

  async scrape(target: ScrapeTarget): Promise<void> {
    const stores = this.storesFor(target);
    for (const [i, store] of stores.entries()) {
      this.checkInterrupted();
      if (i > 0) await this.sleep(this.options.config.interStoreDelayMs, this.options.signal);
      if (store) {
        this.logger.info({ storeId: store.id, store: store.name, index: i + 1, of: stores.length }, "Store context");
      }
      await this.scrapeQuery(target, store);
    }
  }

  /**
   * Paging loop for one query in one store context. Stops at the page limit,
   * on the last page per pagination, on an empty page, or on a fetch error
   * (counted; partial results stay written).
   */
  async scrapeQuery(target: ScrapeTarget, store: StoreLocation | null): Promise<void> {
    const { adapter, records, maxPages } = this.options;
    const singlePage = target.mode === "product";

    for (let page = 1; ; page++) {
      if (maxPages != null && page > maxPages) {
        this.logger.info({ maxPages }, "Page limit reached");
        return;
      }
      this.checkInterrupted();

      const request: PageRequest = { mode: target.mode, target: target.target, page, store };
      let result: PageResult;
      try {
        result = await adapter.fetchPage(request);
      } catch (error) {
        if (error instanceof InterruptedError || error instanceof ConfigError) throw error;
        records.recordError();
        this.logger.error(
          errorMeta(error, { target: target.target, page, store: store?.id ?? null }),
          "Page failed, abandoning query",
        );
        return;
      }
      records.recordPage();

      if (result.rawCount === 0) {
        if (page === 1) {
          this.logger.warn({ target: target.target, store: store?.id ?? null }, "No products on the first page");
        } else {
          this.logger.info({ page }, "Empty page, end of results");
        }
        return;
      }

      await records.saveRecordsBatch(result.records);
      this.logger.info(
        { page, found: result.rawCount, total: records.stats.total_scraped, source: result.source },
        "Page done",
      );

      if (singlePage || isLastPage(result.pagination)) return;
    }
  }

  /** Checkpoint, stats block, optional tabular export */
  async shutdown(startedAt: number, interrupted: boolean): Promise<RunSummary> {
    const { records, checkpoint, outputFormat } = this.options;
    await checkpoint.save(records.seenKeys, records.stats);

    const elapsedSec = (this.clock() - startedAt) / 1000;
    for (const line of formatStats(records.stats, elapsedSec)) this.logger.info(line);

    let csvRows: number | null = null;
    if (outputFormat === "csv" || outputFormat === "both") {
      csvRows = await exportJsonlToCsv(this.options.productsFile, this.options.csvFile, this.logger);
    }
    return { stats: { ...records.stats }, elapsedSec, interrupted, csvRows };
  }

  /**
   * Whole run. Interrupts finish gracefully; any other failure still saves
   * the checkpoint and stats before it propagates.
   */
  async run(target: ScrapeTarget): Promise<RunSummary> {
    const startedAt = this.clock();
    await this.init();

    let interrupted = false;
    try {
      await this.scrape(target);
    } catch (error) {
      if (!(error instanceof InterruptedError)) {
        this.logger.error(errorMeta(error), "Run failed, saving progress");
        await this.shutdown(startedAt, false);
        throw error;
      }
      interrupted = true;
      this.logger.warn("Interrupted, saving progress");
    }
    return this.shutdown(startedAt, interrupted);
  }
}

async function removeIfPresent(file: string): Promise<void> {
  try {
    await fs.unlink(file);
  } catch (error) {
    if (!isMissing(error)) throw error;
  }
}
