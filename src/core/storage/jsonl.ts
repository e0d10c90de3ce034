/**
 * Append-only newline-delimited JSON
 */

import { promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../utils/logger";
import { isMissing } from "../utils/log-files";
import { isRecord, type JsonObject } from "../utils/json";

/**
 * Appends complete, newline-terminated lines and never rewrites what is
 * already there. A torn final line left by a crash is closed off with a
 * newline before the first append so it cannot swallow a new record.
 */
export class JsonlWriter {
  private checked = false;

  constructor(readonly file: string) {}

  private async sealTornLine(): Promise<void> {
    this.checked = true;
    let handle: FileHandle;
    try {
      handle = await fs.open(this.file, "r");
    } catch (error) {
      if (isMissing(error)) return;
      throw error;
    }
    try {
      const { size } = await handle.stat();
      if (size === 0) return;
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      if (last.toString("utf8") !== "\n") await fs.appendFile(this.file, "\n", "utf8");
    } finally {
      await handle.close();
    }
  }

  /** One write for the whole batch */
  async append(records: readonly unknown[]): Promise<void> {
    if (records.length === 0) return;
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    if (!this.checked) await this.sealTornLine();
    const payload = records.map((r) => JSON.stringify(r)).join("\n") + "\n";
    await fs.appendFile(this.file, payload, "utf8");
  }
}

/** Parsed object lines; blank and unparsable lines are skipped */
export async function readJsonLines(file: string, logger?: Logger): Promise<JsonObject[]> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const out: JsonObject[] = [];
  text.split("\n").forEach((line, i) => {
    if (!line.trim()) return;
    try {
      const value: unknown = JSON.parse(line);
      if (isRecord(value)) out.push(value);
    } catch {
      logger?.warn({ file, line: i + 1 }, "Skipping unparsable JSONL line");
    }
  });
  return out;
}
