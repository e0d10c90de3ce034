/**
 * Scrape Service - builds one site's run from its config profile
 * Used by the CLI; everything it wires takes its collaborators explicitly
 */

import { ScrapeOrchestrator, type RunFlags, type RunSummary, type ScrapeTarget } from "../../orchestrator";
import { createAdapter } from "../../sites/registry";
import { PlaywrightBrowserDriver } from "../browser/session";
import { AppConfig } from "../config/app-config";
import { sitePaths, type DirectoryRoots } from "../config/paths";
import { loadSiteConfig } from "../config/site-config";
import { BrowserFetcher } from "../fetch/browser-fetcher";
import { HttpFetcher } from "../fetch/http-fetcher";
import { resolveSearchApiKey, SearchApiFetcher } from "../fetch/search-api-fetcher";
import { ProxyManager } from "../network/proxy-manager";
import { FingerprintClient } from "../network/tls-client";
import { createPacer } from "../pacing";
import { BackupManager } from "../storage/backup";
import { CheckpointManager } from "../storage/checkpoint";
import { RecordStore } from "../storage/record-store";
import { StoreRotator } from "../stores/store-rotator";
import { rotateSiteLogs } from "../utils/log-files";
import { createLogger, flushLogger, type LogLevelName } from "../utils/logger";
import { sleep } from "../utils/sleep";

export interface ScrapeServiceOptions extends Partial<RunFlags> {
  site: string;
  target: ScrapeTarget;
  headless?: boolean;
  logLevel?: LogLevelName;
  signal?: AbortSignal;
  configDir?: string;
  roots?: DirectoryRoots;
  env?: NodeJS.ProcessEnv;
}

export async function runScrape(options: ScrapeServiceOptions): Promise<RunSummary> {
  const configDir = options.configDir ?? AppConfig.CONFIG_DIR;
  const roots = options.roots ?? {
    dataDir: AppConfig.DATA_DIR,
    logsDir: AppConfig.LOGS_DIR,
    logArchiveDir: AppConfig.LOG_ARCHIVE_DIR,
  };

  // Config problems surface before any file is touched
  const config = await loadSiteConfig(options.site, configDir);
  const searchApiKey = config.searchApi ? resolveSearchApiKey(config.searchApi, options.env) : null;
  const today = new Date();
  const paths = sitePaths(config.siteSlug, roots, today);
  const archived = await rotateSiteLogs(config.siteSlug, paths.logsDir, paths.logArchiveDir, today);

  const logger = createLogger({
    level: options.logLevel ?? "info",
    logFile: paths.logFile,
    pretty: AppConfig.PRETTY_LOGS,
  }).child({ site: config.siteSlug });
  if (archived.length > 0) logger.info({ files: archived }, "Archived earlier log files");
  logger.info({ platform: config.platform, mode: options.target.mode, target: options.target.target }, "Starting run");

  const signal = options.signal;
  const pacer = createPacer(config.rateLimit, { logger, signal });
  const proxyManager = new ProxyManager(config.proxy, { logger });
  const client = new FingerprintClient(config.tls, { logger, baseHeaders: config.headers, proxyManager });
  const http = new HttpFetcher({ client, pacer, errorHandling: config.errorHandling, logger, proxyManager, signal });

  let searchApi: SearchApiFetcher | null = null;
  let browser: BrowserFetcher | null = null;
  if (config.platform === "search-index") {
    if (config.searchApi && searchApiKey) {
      searchApi = new SearchApiFetcher(config.searchApi, http, {
        apiKey: searchApiKey,
        referer: config.baseUrl,
        logger,
      });
    }
    const driver = new PlaywrightBrowserDriver({
      headless: options.headless ?? AppConfig.HEADLESS,
      browser: config.browser,
      proxyUrl: () => proxyManager.getProxyUrl(),
      logger,
      random: Math.random,
      sleep,
      signal,
    });
    browser = new BrowserFetcher({ config, driver, pacer, logger, signal });
  }
  const adapter = createAdapter({ config, logger, http, browser, searchApi });

  const orchestrator = new ScrapeOrchestrator({
    config,
    adapter,
    records: new RecordStore({ outputFile: paths.productsFile, logger }),
    checkpoint: new CheckpointManager(paths.checkpointFile, { logger }),
    backup: new BackupManager(paths.backupDir, {
      maxBackups: config.maxBackups,
      compress: config.compressBackups,
      logger,
    }),
    rotator: new StoreRotator(config.storeRotation, { logger }),
    productsFile: paths.productsFile,
    csvFile: paths.csvFile,
    logger,
    signal,
    maxPages: options.maxPages ?? null,
    outputFormat: options.outputFormat ?? config.outputFormat,
    resume: options.resume ?? false,
    clearCheckpoint: options.clearCheckpoint ?? false,
    fresh: options.fresh ?? false,
  });

  try {
    return await orchestrator.run(options.target);
  } finally {
    await adapter.close();
    await flushLogger(logger);
  }
}
