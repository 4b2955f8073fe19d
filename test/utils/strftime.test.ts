import { describe, expect, test } from "vitest";

import { strftime } from "@/utils/strftime";

// 2024-03-05 (星期二) 09:07:03，以本地時間建立
const date = new Date(2024, 2, 5, 9, 7, 3);

describe("strftime", () => {
  test("年月與月份全名", () => {
    expect(strftime(date, "%Y")).toBe("2024");
    expect(strftime(date, "%Y-%m_%B")).toBe("2024-03_March");
  });

  test("其他常用指令", () => {
    expect(strftime(date, "%y/%d %b")).toBe("24/05 Mar");
    expect(strftime(date, "%A %a")).toBe("Tuesday Tue");
    expect(strftime(date, "%H:%M:%S")).toBe("09:07:03");
    expect(strftime(date, "%I %p")).toBe("09 AM");
    expect(strftime(date, "%j")).toBe("065");
    expect(strftime(date, "%e")).toBe(" 5");
  });

  test("%% 輸出百分比符號", () => {
    expect(strftime(date, "100%%")).toBe("100%");
  });

  test("不支援的指令與結尾的 % 原樣輸出", () => {
    expect(strftime(date, "%Q-%Y%")).toBe("%Q-2024%");
  });

  test("沒有指令的文字原樣輸出", () => {
    expect(strftime(date, "Photos")).toBe("Photos");
  });
});
