import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";

const tmpDir = "test/tmp/scanner";

describe("FileSystemScannerDefault", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "100_FUJI", "nested"), { recursive: true });
    await writeFile(join(tmpDir, "notes.txt"), "a");
    await writeFile(join(tmpDir, "DSCF0001.RAF"), "raw");
    await writeFile(join(tmpDir, "100_FUJI", "DSCF0002.jpg"), "jpg");
    await writeFile(join(tmpDir, "100_FUJI", "nested", "DSCF0003.raf"), "raw");
    await writeFile(join(tmpDir, "100_FUJI", "clip.MOV"), "mov");
  });

  test("遞迴列出副檔名符合的檔案，大小寫不拘且可省略前導點", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, [".raf", "JPG"]);
    expectOk(result);
    expect([...result.value].sort()).toEqual(
      [
        join(tmpDir, "100_FUJI", "DSCF0002.jpg"),
        join(tmpDir, "100_FUJI", "nested", "DSCF0003.raf"),
        join(tmpDir, "DSCF0001.RAF"),
      ].sort()
    );
  });

  test("資料夾名稱即使像副檔名也不會被列出", async () => {
    await mkdir(join(tmpDir, "EXPORT.RAF"), { recursive: true });
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, [".RAF"]);
    expectOk(result);
    expect(result.value).not.toContain(join(tmpDir, "EXPORT.RAF"));
    expect(result.value).toHaveLength(2);
  });

  test("副檔名清單為空時不列出任何檔案", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, []);
    expectOk(result);
    expect(result.value).toEqual([]);
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan("no_such_path", [".RAF"]);
    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
  });
});
