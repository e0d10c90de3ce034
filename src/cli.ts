#!/usr/bin/env node
import "dotenv/config";
import { AppConfig } from "./core/config/app-config";
import { listSiteConfigs } from "./core/config/site-config";
import { ConfigError, errorMessage } from "./core/errors";
import { runScrape } from "./core/services/scrape-service";
import type { OutputFormat } from "./core/types/config";
import { createLogger, parseLogLevel } from "./core/utils/logger";
import type { ScrapeTarget } from "./orchestrator";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["jsonl", "csv", "both"];

const USAGE = `Usage:
node dist/cli.js --site <slug> (--query <term> | --category-url <path> | --product-url <url>) [options]

Options:
  --site              Site profile (configs/<slug>.json)
  --query             Search term
  --category-url      Category path on the site
  --product-url       Single product page
  --max-pages         Stop after N pages per query (default: no limit)
  --headless          Run the browser headless (default)
  --headful           Show the browser window
  --output-format     jsonl | csv | both (default: from the site profile)
  --resume            Continue from the saved checkpoint
  --clear-checkpoint  Delete the checkpoint before starting
  --fresh             Back up, then clear output and checkpoint
  --log-level         DEBUG | INFO | WARNING | ERROR
  --list              List available sites

Examples:
  npm run cli -- --site realcanadiansuperstore --query milk --max-pages 3
  npm run cli -- --site sobeys --query "orange juice" --resume --output-format both`;

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  const logLevel = parseLogLevel(getArg("--log-level") ?? AppConfig.LOG_LEVEL);
  const logger = createLogger({ level: logLevel, pretty: AppConfig.PRETTY_LOGS });

  if (hasFlag("--help") || hasFlag("-h")) {
    console.log(USAGE);
    return 0;
  }

  if (hasFlag("--list")) {
    const sites = await listSiteConfigs(AppConfig.CONFIG_DIR);
    console.log(`Available sites: ${sites.join(", ") || "(none)"}`);
    return 0;
  }

  const site = getArg("--site") ?? process.env.SITE;
  if (!site) {
    logger.error("Missing --site");
    console.log(USAGE);
    return 1;
  }

  const targets: ScrapeTarget[] = [];
  const query = getArg("--query");
  const categoryUrl = getArg("--category-url");
  const productUrl = getArg("--product-url");
  if (query) targets.push({ mode: "search", target: query });
  if (categoryUrl) targets.push({ mode: "category", target: categoryUrl });
  if (productUrl) targets.push({ mode: "product", target: productUrl });
  if (targets.length !== 1) {
    logger.error("Give exactly one of --query, --category-url or --product-url");
    return 1;
  }

  const maxPagesArg = getArg("--max-pages");
  const maxPages = maxPagesArg === undefined ? null : Number(maxPagesArg);
  if (maxPages !== null && (!Number.isInteger(maxPages) || maxPages < 1)) {
    logger.error(`--max-pages must be a positive integer, got "${maxPagesArg}"`);
    return 1;
  }

  const formatArg = getArg("--output-format");
  const outputFormat = OUTPUT_FORMATS.find((f) => f === formatArg);
  if (formatArg !== undefined && !outputFormat) {
    logger.error(`--output-format must be one of ${OUTPUT_FORMATS.join(", ")}`);
    return 1;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupt received, finishing up");
    controller.abort();
  });

  try {
    const summary = await runScrape({
      site,
      target: targets[0],
      maxPages,
      outputFormat,
      headless: hasFlag("--headful") ? false : hasFlag("--headless") ? true : undefined,
      resume: hasFlag("--resume"),
      clearCheckpoint: hasFlag("--clear-checkpoint"),
      fresh: hasFlag("--fresh"),
      logLevel,
      signal: controller.signal,
    });
    if (summary.interrupted) logger.info("Run interrupted; progress saved, use --resume to continue");
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error(`Run failed: ${errorMessage(error)}`);
    }
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
