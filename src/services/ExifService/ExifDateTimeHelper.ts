import { ExifDateTime } from "exiftool-vendored";

const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

function toLocalDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): Date | undefined {
  // 防止 2024:02:30 之類被 Date 自動進位
  const daysInMonth = new Date(year, month, 0).getDate();
  if (
    year < 1 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return undefined;
  }
  const d = new Date(year, month - 1, day, hour, minute, second, 0);
  if (Number.isNaN(d.getTime())) return undefined;
  return d;
}

/**
 * 解析 EXIF 日期字串 "YYYY:MM:DD HH:mm:ss"，以本地時間建立 Date。
 * 資料夾以拍攝當地的日期時間命名，因此不套用時區偏移。
 */
export function parseExifDateTime(raw: string): Date | undefined {
  const m = RAW_BASIC_RE.exec(raw.trim());
  if (!m) return undefined;
  return toLocalDate(
    Number(m[1]),
    Number(m[2]),
    Number(m[3]),
    Number(m[4]),
    Number(m[5]),
    Number(m[6])
  );
}

/**
 * 將 exiftool 回傳的 DateTimeOriginal 轉為本地時間的 Date。
 * 規則：
 * 1) 字串：依 EXIF 格式解析
 * 2) ExifDateTime：優先使用 rawValue，否則使用其年月日時分秒欄位
 * 3) 無效資料回傳 undefined
 */
export function getCaptureTime(
  time: ExifDateTime | string | undefined
): Date | undefined {
  if (!time) return undefined;
  if (typeof time === "string") return parseExifDateTime(time);

  const fromRaw = time.rawValue ? parseExifDateTime(time.rawValue) : undefined;
  if (fromRaw) return fromRaw;

  return toLocalDate(
    time.year,
    time.month,
    time.day,
    time.hour,
    time.minute,
    time.second
  );
}

export function isExifDateTime(value: unknown): value is ExifDateTime {
  return value instanceof ExifDateTime;
}
