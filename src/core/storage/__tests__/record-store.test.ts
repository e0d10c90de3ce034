import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { makeRecord, silentLogger, tempDir } from "../../__tests__/helpers";
import { RecordStore } from "../record-store";

const readLines = (file: string) =>
  readFileSync(file, "utf8")
    .split("\n")
    .filter(Boolean)
    .map((line) => JSON.parse(line));

function newStore() {
  const outputFile = path.join(tempDir(), "raw", "shop_products.jsonl");
  return { outputFile, store: new RecordStore({ outputFile, logger: silentLogger() }) };
}

describe("RecordStore", () => {
  it("persists a record once and counts the repeat as a duplicate", async () => {
    const { outputFile, store } = newStore();
    const record = makeRecord();

    expect(await store.saveRecord(record)).toBe(true);
    expect(await store.saveRecord({ ...record })).toBe(false);

    expect(readLines(outputFile)).toHaveLength(1);
    expect(store.stats.total_scraped).toBe(1);
    expect(store.stats.duplicates_skipped).toBe(1);
  });

  it("counts invalid records without writing them", async () => {
    const { store } = newStore();
    expect(await store.saveRecord(makeRecord({ name: "" }))).toBe(false);
    expect(await store.saveRecord({ ...makeRecord(), availability: "discontinued" })).toBe(false);
    expect(store.stats.invalid_records).toBe(2);
    expect(store.stats.total_scraped).toBe(0);
  });

  it("filters a batch against seen keys and within itself before one append", async () => {
    const { outputFile, store } = newStore();
    store.seed(["testgrocer:SKU-1"]);

    const written = await store.saveRecordsBatch([
      makeRecord({ external_id: "SKU-1" }),
      makeRecord({ external_id: "SKU-2" }),
      makeRecord({ external_id: "SKU-2", price: 1 }),
      makeRecord({ external_id: "SKU-3", price: -1 }),
      makeRecord({ external_id: "SKU-4" }),
    ]);

    expect(written).toBe(2);
    expect(readLines(outputFile).map((r) => r.external_id)).toEqual(["SKU-2", "SKU-4"]);
    expect(store.stats).toEqual({
      total_scraped: 2,
      duplicates_skipped: 2,
      invalid_records: 1,
      pages_processed: 0,
      errors: 0,
    });
    expect(store.hasSeen("testgrocer:SKU-4")).toBe(true);
  });

  it("keeps regional variants of the same product", async () => {
    const { store } = newStore();
    const written = await store.saveRecordsBatch([
      makeRecord({ store_id: "0320" }),
      makeRecord({ store_id: "0515" }),
    ]);
    expect(written).toBe(2);
  });

  it("resumes cumulative stats from a checkpoint", () => {
    const { store } = newStore();
    store.seed([], { total_scraped: 10, duplicates_skipped: 1, invalid_records: 0, pages_processed: 3, errors: 1 });
    store.recordPage();
    store.recordError();
    expect(store.stats.pages_processed).toBe(4);
    expect(store.stats.errors).toBe(2);
  });
});
