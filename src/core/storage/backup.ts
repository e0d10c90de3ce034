/**
 * Timestamped backups with retention
 */

import { createReadStream, createWriteStream, promises as fs } from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { compactStamp } from "../utils/date";
import { isMissing } from "../utils/log-files";
import type { Logger } from "../utils/logger";

export interface BackupOptions {
  maxBackups: number;
  compress: boolean;
  logger: Logger;
  now?: () => Date;
}

const escapeRe = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export class BackupManager {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    readonly backupDir: string,
    private readonly options: BackupOptions,
  ) {
    this.logger = options.logger.child({ component: "backup" });
    this.now = options.now ?? (() => new Date());
  }

  private pattern(file: string): RegExp {
    const ext = path.extname(file);
    const stem = path.basename(file, ext);
    return new RegExp(`^${escapeRe(stem)}_\\d{8}_\\d{6}_\\d{3}${escapeRe(ext)}(\\.gz)?$`);
  }

  /**
   * Copies `file` into the backup dir as <stem>_<stamp><ext>[.gz], then
   * applies retention. Null when there is nothing to back up.
   */
  async backupFile(file: string): Promise<string | null> {
    let size: number;
    try {
      size = (await fs.stat(file)).size;
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
    if (size === 0) return null;

    const ext = path.extname(file);
    const stem = path.basename(file, ext);
    const name = `${stem}_${compactStamp(this.now())}${ext}${this.options.compress ? ".gz" : ""}`;
    const target = path.join(this.backupDir, name);

    await fs.mkdir(this.backupDir, { recursive: true });
    if (this.options.compress) {
      await pipeline(createReadStream(file), createGzip(), createWriteStream(target));
    } else {
      await fs.copyFile(file, target);
    }
    this.logger.info({ file, backup: target, compressed: this.options.compress }, "Backup created");

    await this.enforceRetention(file);
    return target;
  }

  /** Backups of `file`, newest first */
  async listBackups(file: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.backupDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    const re = this.pattern(file);
    return names
      .filter((n) => re.test(n))
      .sort()
      .reverse()
      .map((n) => path.join(this.backupDir, n));
  }

  /** Deletes all but the `maxBackups` most recent; returns what was removed */
  async enforceRetention(file: string): Promise<string[]> {
    const backups = await this.listBackups(file);
    const excess = backups.slice(this.options.maxBackups);
    for (const old of excess) await fs.unlink(old);
    if (excess.length > 0) {
      this.logger.info({ removed: excess.length, kept: backups.length - excess.length }, "Old backups removed");
    }
    return excess;
  }
}
