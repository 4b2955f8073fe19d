import type { IngestConfig } from "@/config/IngestConfig";

import type { CaptureDateSource } from "./CaptureDateResolver";
import type { SessionOrigin } from "./SessionLocator";

export interface IngestService {
  /**
   * 將來源資料夾中符合副檔名的檔案搬移到目的磁碟區的工作階段資料夾。
   * 不會拋出例外：前置條件失敗時回傳 fatal 結果，單一檔案失敗則記錄後繼續。
   */
  ingest(config: IngestConfig, onEvent?: OnIngestEvent): Promise<IngestResult>;
}

export type FileMove = { from: string; to: string };

export type IngestResult = {
  successCount: number;
  failCount: number;
  /** 符合副檔名的檔案總數 */
  total: number;
  /** 依發生順序排列的錯誤訊息 */
  errors: string[];
  moves: FileMove[];
  /** 前置條件失敗，沒有處理任何檔案 */
  fatal: boolean;
};

export type IngestEvent =
  | {
      type: "ingest.start";
      sourcePath: string;
      destinationRoot: string;
      volumeLabel: string;
    }
  | { type: "ingest.scan"; total: number }
  | { type: "ingest.session"; sessionPath: string; origin: SessionOrigin }
  | {
      type: "ingest.file.moved";
      from: string;
      to: string;
      sessionName: string;
      dateSource: CaptureDateSource;
    }
  | { type: "ingest.file.failed"; filePath: string; message: string }
  | {
      type: "ingest.progress";
      completed: number;
      total: number;
      percent: number;
    }
  | { type: "ingest.aborted"; message: string }
  | {
      type: "ingest.done";
      successCount: number;
      failCount: number;
      elapsedMs: number;
    };

export type OnIngestEvent = (event: IngestEvent) => void;
