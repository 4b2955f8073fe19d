import { constants } from "node:fs";
import { copyFile, open, rename, stat, unlink } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function confirm(question: string) {
  const rl = createInterface({ input, output });
  const ans = (await rl.question(question)).trim().toLowerCase();
  rl.close();
  return ans === "y" || ans === "yes";
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string) {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/** 建立空檔案；已存在時不改動內容 */
export async function touch(filePath: string) {
  const handle = await open(filePath, "a");
  await handle.close();
}

/**
 * 搬移檔案。跨磁碟（EXDEV）時改為複製後刪除來源。
 */
export async function moveFile(from: string, to: string) {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EXDEV") throw error;
    await copyFile(from, to, constants.COPYFILE_EXCL);
    await unlink(from);
  }
}

export function isErrnoException(
  error: unknown
): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
