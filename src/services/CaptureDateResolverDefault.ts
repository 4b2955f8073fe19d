import { stat } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage } from "@/utils/helper";

import type {
  CaptureDate,
  CaptureDateError,
  CaptureDateResolver,
} from "./CaptureDateResolver";
import type { ExifService } from "./ExifService";

export class CaptureDateResolverDefault implements CaptureDateResolver {
  private readonly exifService: ExifService | undefined;
  private readonly logger: Logger;

  /**
   * exifService 可省略；省略時一律使用檔案修改時間。
   */
  constructor(deps: { exifService?: ExifService; logger: Logger }) {
    this.exifService = deps.exifService;
    this.logger = deps.logger.extend("CaptureDateResolver");
  }

  async resolve(
    filePath: string
  ): Promise<Result<CaptureDate, CaptureDateError>> {
    if (this.exifService) {
      const exif = await this.exifService.readCaptureInfo(filePath);
      if (exif.ok && exif.value.captureTime) {
        return ok({ time: exif.value.captureTime, source: "exif" });
      }
      this.logger.debug({
        filePath,
        reason: exif.ok ? "NO_CAPTURE_TIME" : exif.error.type,
      })`無法從 EXIF 取得拍攝時間，改用修改時間`;
    }

    try {
      const { mtime } = await stat(filePath);
      if (Number.isNaN(mtime.getTime())) {
        return err({
          type: "DATE_UNAVAILABLE",
          message: "無法判斷檔案日期",
        });
      }
      return ok({ time: mtime, source: "mtime" });
    } catch (error) {
      return err({
        type: "DATE_UNAVAILABLE",
        message: `無法判斷檔案日期 (${errorMessage(error)})`,
      });
    }
  }
}
