/** 工作階段資料夾內放置匯入檔案的子資料夾 */
export const captureFolderName = "Capture";

/** 工作階段標記檔副檔名，檔名為 `<session_name>.cosessiondb` */
export const sessionMarkerExtension = ".cosessiondb";

/** session_format 中代表月份全名的 token */
export const monthNameToken = "{month_name}";

/** 重複檔名時最多嘗試的流水號數量 */
export const maxCollisionAttempts = 10_000;

export const defaultVolumeLabel = "Local Drive";
