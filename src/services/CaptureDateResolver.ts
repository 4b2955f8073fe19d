import type { Result } from "~shared/utils/Result";

export type CaptureDateSource = "exif" | "mtime";

export type CaptureDate = {
  time: Date;
  source: CaptureDateSource;
};

export type CaptureDateError = {
  type: "DATE_UNAVAILABLE";
  message: string;
};

export interface CaptureDateResolver {
  /**
   * 決定檔案的拍攝時間：優先使用 EXIF DateTimeOriginal，
   * 讀不到時退回檔案修改時間，兩者皆失敗才回傳錯誤。
   */
  resolve(filePath: string): Promise<Result<CaptureDate, CaptureDateError>>;
}
