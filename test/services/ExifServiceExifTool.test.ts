import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { expectErr } from "~shared/testkit/ExpectResult";
import { dispose } from "~shared/utils/Disposeable";

import { ExifServiceExifTool } from "@/services/ExifService";

const tmpDir = "test/tmp/exiftool";

describe("ExifServiceExifTool", () => {
  const service = new ExifServiceExifTool();

  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  afterAll(async () => {
    await dispose(service);
  });

  test("檔案不存在時回傳 FILE_NOT_FOUND", async () => {
    const filePath = join(tmpDir, "missing.RAF");
    const result = await service.readCaptureInfo(filePath);
    expectErr(result);
    expect(result.error).toEqual({
      type: "FILE_NOT_FOUND",
      message: `找不到檔案: ${filePath}`,
    });
  });

  test("沒有 DateTimeOriginal 的檔案回傳 NO_EXIF_DATA", async () => {
    const filePath = join(tmpDir, "notes.txt");
    await writeFile(filePath, "not a photo\n");
    const result = await service.readCaptureInfo(filePath);
    expectErr(result);
    expect(result.error).toEqual({
      type: "NO_EXIF_DATA",
      message: `無 DateTimeOriginal: ${filePath}`,
    });
  }, 30_000);
});
