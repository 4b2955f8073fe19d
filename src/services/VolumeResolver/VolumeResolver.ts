import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { Volume, VolumeEnumerator, VolumeError } from "./Volume";
import { VolumeEnumeratorLinux } from "./VolumeEnumeratorLinux";
import { VolumeEnumeratorMacos } from "./VolumeEnumeratorMacos";
import { VolumeEnumeratorNull } from "./VolumeEnumeratorNull";
import { VolumeEnumeratorWindows } from "./VolumeEnumeratorWindows";

export function createVolumeEnumerator(
  platform: NodeJS.Platform = process.platform
): VolumeEnumerator {
  switch (platform) {
    case "win32":
      return new VolumeEnumeratorWindows();
    case "linux":
      return new VolumeEnumeratorLinux();
    case "darwin":
      return new VolumeEnumeratorMacos();
    default:
      return new VolumeEnumeratorNull();
  }
}

export class VolumeResolver {
  private readonly enumerator: VolumeEnumerator;
  private readonly fallback: VolumeEnumerator;
  private readonly logger: Logger;

  constructor(deps: {
    enumerator: VolumeEnumerator;
    fallback?: VolumeEnumerator;
    logger: Logger;
  }) {
    this.enumerator = deps.enumerator;
    this.fallback = deps.fallback ?? new VolumeEnumeratorNull();
    this.logger = deps.logger.extend("VolumeResolver");
  }

  /**
   * 列出目前的磁碟區；查詢失敗時退回單一預設磁碟區。
   */
  async enumerate(): Promise<Volume[]> {
    try {
      return await this.enumerator.list();
    } catch (error) {
      this.logger.warn({ error })`無法列出磁碟區，改用預設磁碟區`;
      return this.fallback.list();
    }
  }

  /**
   * 以標籤完全比對找出目前的掛載路徑。
   */
  async resolve(label: string): Promise<Result<string, VolumeError>> {
    const volumes = await this.enumerate();
    const volume = volumes.find((v) => v.label === label);
    if (!volume) {
      return err({
        type: "VOLUME_NOT_FOUND",
        message: `無法將磁碟區標籤「${label}」解析為掛載路徑`,
      });
    }
    this.logger.debug({ label, mountPath: volume.mountPath })`磁碟區已解析`;
    return ok(volume.mountPath);
  }
}
