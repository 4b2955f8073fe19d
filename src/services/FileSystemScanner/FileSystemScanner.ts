import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export interface FileSystemScanner {
  /**
   * 遞迴列出 rootPath 底下副檔名在清單中的檔案（不分大小寫）。
   * 清單為空時不回傳任何檔案。順序為檔案系統走訪順序。
   */
  scan(
    rootPath: string,
    extensions: readonly string[]
  ): Promise<Result<string[], ScanError>>;
}
