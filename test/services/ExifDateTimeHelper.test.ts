import { ExifDateTime } from "exiftool-vendored";
import { describe, expect, test } from "vitest";

import {
  getCaptureTime,
  isExifDateTime,
  parseExifDateTime,
} from "@/services/ExifService";

describe("parseExifDateTime", () => {
  test("以本地時間解析 EXIF 日期", () => {
    expect(parseExifDateTime("2024:03:15 10:30:05")).toEqual(
      new Date(2024, 2, 15, 10, 30, 5)
    );
  });

  test("前後空白可接受", () => {
    expect(parseExifDateTime(" 2024:03:15 10:30:05 ")).toEqual(
      new Date(2024, 2, 15, 10, 30, 5)
    );
  });

  test.each([
    "2024:02:30 10:00:00",
    "2024:13:01 10:00:00",
    "2024:03:15 24:00:00",
    "0000:00:00 00:00:00",
    "2024-03-15T10:30:05",
    "",
  ])("無效的日期 %j 回傳 undefined", (raw) => {
    expect(parseExifDateTime(raw)).toBeUndefined();
  });

  test("閏年 2 月 29 日", () => {
    expect(parseExifDateTime("2024:02:29 00:00:00")).toEqual(
      new Date(2024, 1, 29)
    );
  });
});

describe("getCaptureTime", () => {
  test("字串", () => {
    expect(getCaptureTime("2023:12:31 23:59:59")).toEqual(
      new Date(2023, 11, 31, 23, 59, 59)
    );
  });

  test("ExifDateTime 使用原始值", () => {
    const value = ExifDateTime.fromEXIF("2024:03:15 10:30:05");
    expect(isExifDateTime(value)).toBe(true);
    expect(getCaptureTime(value)).toEqual(new Date(2024, 2, 15, 10, 30, 5));
  });

  test("帶時區的 ExifDateTime 保留拍攝當地的時間", () => {
    const value = ExifDateTime.fromEXIF("2024:03:15 10:30:05+09:00");
    expect(getCaptureTime(value)).toEqual(new Date(2024, 2, 15, 10, 30, 5));
  });

  test("沒有值", () => {
    expect(getCaptureTime(undefined)).toBeUndefined();
    expect(isExifDateTime("2024:03:15 10:30:05")).toBe(false);
  });
});
