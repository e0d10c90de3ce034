/**
 * On-disk layout per site
 */

import path from "node:path";
import { datedLogFileName } from "../utils/log-files";

export interface SitePaths {
  outputDir: string;
  productsFile: string;
  csvFile: string;
  backupDir: string;
  checkpointFile: string;
  logsDir: string;
  logFile: string;
  logArchiveDir: string;
}

export interface DirectoryRoots {
  dataDir: string;
  logsDir: string;
  logArchiveDir: string;
}

export function sitePaths(slug: string, roots: DirectoryRoots, today: Date = new Date()): SitePaths {
  const outputDir = path.join(roots.dataDir, "raw", slug);
  return {
    outputDir,
    productsFile: path.join(outputDir, `${slug}_products.jsonl`),
    csvFile: path.join(outputDir, `${slug}_products.csv`),
    backupDir: path.join(outputDir, "backups"),
    checkpointFile: path.join(roots.dataDir, "checkpoints", `${slug}_checkpoint.json`),
    logsDir: roots.logsDir,
    logFile: path.join(roots.logsDir, datedLogFileName(slug, today)),
    logArchiveDir: roots.logArchiveDir,
  };
}
