import path from "node:path";

import { defaultVolumeLabel } from "@/constants";

import type { Volume, VolumeEnumerator } from "./Volume";

/** 無法查詢磁碟區時使用：只回傳檔案系統根目錄一個預設磁碟區 */
export class VolumeEnumeratorNull implements VolumeEnumerator {
  private readonly volume: Volume;

  constructor(rootPath: string = path.parse(process.cwd()).root) {
    this.volume = { mountPath: rootPath, label: defaultVolumeLabel };
  }

  async list(): Promise<Volume[]> {
    return [{ ...this.volume }];
  }
}
