import type { Result } from "~shared/utils/Result";

/** 匯入時用到的 EXIF 欄位 */
export type CaptureInfo = {
  filePath: string;
  /** DateTimeOriginal，以拍攝當地的時間解讀，不套用時區 */
  captureTime?: Date;
};

export type ExifReadError = {
  type: "FILE_NOT_FOUND" | "READ_FAILED" | "NO_EXIF_DATA";
  message: string;
};

export interface ExifService {
  /**
   * 讀取拍攝資訊。檔案沒有可用的 DateTimeOriginal 時回傳 NO_EXIF_DATA。
   */
  readCaptureInfo(
    filePath: string
  ): Promise<Result<CaptureInfo, ExifReadError>>;
}
