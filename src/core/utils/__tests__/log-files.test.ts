import { existsSync, mkdirSync, readdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { tempDir } from "../../__tests__/helpers";
import { datedLogFileName, rotateSiteLogs } from "../log-files";

const today = new Date(2024, 2, 5, 9);

describe("datedLogFileName", () => {
  it("stamps the slug with the local date", () => {
    expect(datedLogFileName("nofrills", today)).toBe("nofrills_2024_march_05.log");
  });
});

describe("rotateSiteLogs", () => {
  it("archives only this site's logs from earlier days", async () => {
    const root = tempDir();
    const logs = path.join(root, "logs");
    const archive = path.join(root, "logs", "archive");
    mkdirSync(logs);
    for (const name of [
      "nofrills_2024_march_04.log",
      "nofrills_2024_march_05.log",
      "sobeys_2024_march_04.log",
      "nofrills_notes.txt",
    ]) {
      writeFileSync(path.join(logs, name), "line\n");
    }

    const moved = await rotateSiteLogs("nofrills", logs, archive, today);

    expect(moved).toEqual(["nofrills_2024_march_04.log"]);
    expect(readdirSync(archive)).toEqual(["nofrills_2024_march_04.log"]);
    expect(existsSync(path.join(logs, "nofrills_2024_march_05.log"))).toBe(true);
    expect(existsSync(path.join(logs, "sobeys_2024_march_04.log"))).toBe(true);
  });

  it("does nothing when the log directory does not exist yet", async () => {
    const root = tempDir();
    expect(await rotateSiteLogs("nofrills", path.join(root, "logs"), path.join(root, "archive"), today)).toEqual([]);
    expect(existsSync(path.join(root, "archive"))).toBe(false);
  });
});
