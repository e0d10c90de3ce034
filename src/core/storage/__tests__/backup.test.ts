import { existsSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { gunzipSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import { silentLogger, tempDir } from "../../__tests__/helpers";
import { BackupManager } from "../backup";

/** A clock that moves one second per backup so stamps differ */
function steppingNow(start = Date.UTC(2024, 2, 5, 10, 0, 0)): () => Date {
  let t = start;
  return () => new Date((t += 1000));
}

describe("BackupManager", () => {
  it("keeps exactly the N most recent after N+2 backups", async () => {
    const dir = tempDir();
    const file = path.join(dir, "shop_products.jsonl");
    const backups = new BackupManager(path.join(dir, "backups"), {
      maxBackups: 3,
      compress: false,
      logger: silentLogger(),
      now: steppingNow(),
    });

    const made: string[] = [];
    for (let i = 0; i < 5; i++) {
      writeFileSync(file, `{"run":${i}}\n`);
      const target = await backups.backupFile(file);
      if (target) made.push(target);
    }

    const remaining = await backups.listBackups(file);
    expect(remaining).toHaveLength(3);
    expect(remaining).toEqual(made.slice(2).reverse());
    expect(readFileSync(remaining[0], "utf8")).toBe('{"run":4}\n');
  });

  it("names backups with a sortable UTC stamp", async () => {
    const dir = tempDir();
    const file = path.join(dir, "shop_products.jsonl");
    writeFileSync(file, "x\n");
    const backups = new BackupManager(path.join(dir, "backups"), {
      maxBackups: 5,
      compress: false,
      logger: silentLogger(),
      now: () => new Date(Date.UTC(2024, 2, 5, 10, 4, 5, 67)),
    });
    const target = await backups.backupFile(file);
    expect(target).toBe(path.join(dir, "backups", "shop_products_20240305_100405_067.jsonl"));
  });

  it("gzips when compression is on", async () => {
    const dir = tempDir();
    const file = path.join(dir, "shop_products.jsonl");
    writeFileSync(file, '{"a":1}\n');
    const backups = new BackupManager(path.join(dir, "backups"), {
      maxBackups: 5,
      compress: true,
      logger: silentLogger(),
      now: steppingNow(),
    });
    const target = await backups.backupFile(file);
    expect(target?.endsWith(".jsonl.gz")).toBe(true);
    expect(gunzipSync(readFileSync(target ?? "")).toString("utf8")).toBe('{"a":1}\n');
  });

  it("skips missing and empty files", async () => {
    const dir = tempDir();
    const backups = new BackupManager(path.join(dir, "backups"), {
      maxBackups: 5,
      compress: false,
      logger: silentLogger(),
    });
    expect(await backups.backupFile(path.join(dir, "missing.jsonl"))).toBeNull();

    const empty = path.join(dir, "empty.jsonl");
    writeFileSync(empty, "");
    expect(await backups.backupFile(empty)).toBeNull();
    expect(existsSync(path.join(dir, "backups"))).toBe(false);
  });

  it("leaves unrelated files in the backup dir alone", async () => {
    const dir = tempDir();
    const backupDir = path.join(dir, "backups");
    const file = path.join(dir, "shop_products.jsonl");
    const backups = new BackupManager(backupDir, {
      maxBackups: 1,
      compress: false,
      logger: silentLogger(),
      now: steppingNow(),
    });
    writeFileSync(file, "x\n");
    await backups.backupFile(file);
    writeFileSync(path.join(backupDir, "notes.txt"), "keep");
    await backups.backupFile(file);
    expect(readdirSync(backupDir).sort()).toEqual(["notes.txt", "shop_products_20240305_100002_000.jsonl"]);
  });
});
