import { describe, expect, it } from "vitest";
import { sitePaths } from "../paths";

describe("sitePaths", () => {
  it("lays out output, checkpoint and dated log per site", () => {
    const paths = sitePaths(
      "sobeys",
      { dataDir: "/data", logsDir: "/logs", logArchiveDir: "/logs/archive" },
      new Date(2024, 2, 7, 12),
    );

    expect(paths).toEqual({
      outputDir: "/data/raw/sobeys",
      productsFile: "/data/raw/sobeys/sobeys_products.jsonl",
      csvFile: "/data/raw/sobeys/sobeys_products.csv",
      backupDir: "/data/raw/sobeys/backups",
      checkpointFile: "/data/checkpoints/sobeys_checkpoint.json",
      logsDir: "/logs",
      logFile: "/logs/sobeys_2024_march_07.log",
      logArchiveDir: "/logs/archive",
    });
  });
});
