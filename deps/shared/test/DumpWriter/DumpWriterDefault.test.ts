import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import { buildTestLogger } from "~shared/testkit/TestLogger";

describe("DumpWriterDefault", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "dump-writer-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("以名稱與時間戳記輸出 JSON", async () => {
    const outputDir = path.join(tmpDir, "reports");
    const writer = new DumpWriterDefault(
      buildTestLogger(),
      outputDir,
      () => new Date(2024, 2, 15, 10, 30, 5)
    );

    const filePath = await writer.dump("ingest-report", { successCount: 2 });

    expect(filePath).toBe(
      path.join(outputDir, "ingest-report-20240315-103005.json")
    );
    expect(await readFile(filePath, "utf8")).toBe(
      '{\n  "successCount": 2\n}\n'
    );
  });
});
