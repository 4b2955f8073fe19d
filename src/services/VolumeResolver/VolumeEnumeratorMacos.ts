import { readdir } from "node:fs/promises";
import path from "node:path";

import type { Volume, VolumeEnumerator } from "./Volume";

/**
 * macOS 上每個掛載的磁碟區都出現在 /Volumes 底下，資料夾名稱即為標籤。
 */
export class VolumeEnumeratorMacos implements VolumeEnumerator {
  private readonly volumesDir: string;

  constructor(volumesDir = "/Volumes") {
    this.volumesDir = volumesDir;
  }

  async list(): Promise<Volume[]> {
    const entries = await readdir(this.volumesDir, { withFileTypes: true });
    return entries
      .filter(
        (entry) =>
          !entry.name.startsWith(".") &&
          (entry.isDirectory() || entry.isSymbolicLink())
      )
      .map((entry) => ({
        mountPath: path.join(this.volumesDir, entry.name),
        label: entry.name,
      }));
  }
}
