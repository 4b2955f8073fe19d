import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { shouldProcessFile } from "@/config/IngestConfig";
import { errorMessage } from "@/utils/helper";

import type { FileSystemScanner, ScanError } from "./FileSystemScanner";

/** ".raf"、"RAF" 都視為 ".RAF" */
function normalizeExtension(ext: string) {
  const trimmed = ext.trim().toUpperCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    extensions: readonly string[]
  ): Promise<Result<string[], ScanError>> {
    const allowed = extensions.map(normalizeExtension);
    if (allowed.length === 0) return ok([]);

    let entries: Dirent[];
    try {
      entries = await readdir(rootPath, { recursive: true, withFileTypes: true });
    } catch (error) {
      return err({ type: "SCAN_FAILED", message: errorMessage(error) });
    }

    const candidates: string[] = [];
    for (const entry of entries) {
      if (entry.isFile() && shouldProcessFile(entry.name, allowed)) {
        candidates.push(path.join(entry.parentPath, entry.name));
      }
    }
    return ok(candidates);
  }
}
