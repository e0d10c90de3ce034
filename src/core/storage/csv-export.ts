/**
 * JSONL → CSV export
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify";
import type { JsonObject } from "../utils/json";
import type { Logger } from "../utils/logger";
import { readJsonLines } from "./jsonl";

/** Nested values become JSON text in a single cell; null/undefined become empty */
export function toCell(value: unknown): string {
  if (value == null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** Union of keys in first-seen order */
export function collectColumns(rows: readonly JsonObject[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) for (const key of Object.keys(row)) seen.add(key);
  return [...seen];
}

export function rowsToCsv(rows: readonly JsonObject[]): Promise<string> {
  const columns = collectColumns(rows);
  const table = rows.map((row) => columns.map((c) => toCell(row[c])));
  return new Promise((resolve, reject) => {
    stringify(table, { header: true, columns }, (error, output) => {
      if (error) reject(error);
      else resolve(output);
    });
  });
}

/** Writes the whole accumulated log as CSV; returns the row count */
export async function exportJsonlToCsv(jsonlFile: string, csvFile: string, logger: Logger): Promise<number> {
  const rows = await readJsonLines(jsonlFile, logger);
  if (rows.length === 0) {
    logger.warn({ file: jsonlFile }, "No records to export");
    return 0;
  }
  const csv = await rowsToCsv(rows);
  await fs.mkdir(path.dirname(csvFile), { recursive: true });
  await fs.writeFile(csvFile, csv, "utf8");
  logger.info({ rows: rows.length, file: csvFile }, "Exported CSV");
  return rows.length;
}
