import { exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage, exists } from "@/utils/helper";

import { getCaptureTime, isExifDateTime } from "./ExifDateTimeHelper";
import type { CaptureInfo, ExifReadError, ExifService } from "./ExifService";

/**
 * 透過共用的 exiftool 程序讀取 EXIF。用完必須 dispose 以結束背景程序。
 */
export class ExifServiceExifTool implements ExifService, AsyncDisposable {
  async readCaptureInfo(
    filePath: string
  ): Promise<Result<CaptureInfo, ExifReadError>> {
    if (!(await exists(filePath))) {
      return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
    }

    try {
      const tags = await exiftool.read(filePath);
      const original = tags.DateTimeOriginal;
      const captureTime =
        typeof original === "string" || isExifDateTime(original)
          ? getCaptureTime(original)
          : undefined;

      if (!captureTime) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無 DateTimeOriginal: ${filePath}`,
        });
      }

      return ok({ filePath, captureTime });
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath} (${errorMessage(e)})`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
