import type { Result } from "~shared/utils/Result";

import type { IngestConfig } from "@/config/IngestConfig";

export type WriteError = { type: "WRITE_FAILED"; message: string };

export interface ConfigStore {
  readonly filePath: string;

  /**
   * 讀取設定檔並以預設值補齊缺少的 key。
   * 檔案不存在或格式錯誤時回傳預設設定，不會拋出例外。
   */
  load(): Promise<IngestConfig>;

  save(config: IngestConfig): Promise<Result<null, WriteError>>;
}
