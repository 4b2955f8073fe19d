import { format } from "date-fns";

import type { IngestConfig } from "@/config/IngestConfig";
import { monthNameToken } from "@/constants";
import { strftime } from "@/utils/strftime";

export type SessionSegments = {
  year: string;
  month: string;
  sessionName: string;
};

export type PathFormatConfig = Pick<
  IngestConfig,
  "year_format" | "month_format" | "session_format"
>;

/**
 * 由拍攝時間產生 年 / 月 / 工作階段 三段路徑。
 * session_format 不是 strftime 樣式，只會把 {month_name} 換成英文月份全名。
 * 產生的名稱不檢查檔案系統不允許的字元。
 */
export function buildSessionSegments(
  time: Date,
  config: PathFormatConfig
): SessionSegments {
  return {
    year: strftime(time, config.year_format),
    month: strftime(time, config.month_format),
    sessionName: config.session_format.replaceAll(
      monthNameToken,
      format(time, "MMMM")
    ),
  };
}
