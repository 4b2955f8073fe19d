import { format, getDayOfYear } from "date-fns";

type Directive = string | ((date: Date) => string);

/** strftime 指令 → date-fns token */
const directives: Record<string, Directive> = {
  Y: "yyyy",
  y: "yy",
  m: "MM",
  d: "dd",
  e: (date) => String(date.getDate()).padStart(2, " "),
  B: "MMMM",
  b: "MMM",
  A: "EEEE",
  a: "EEE",
  H: "HH",
  I: "hh",
  M: "mm",
  S: "ss",
  p: "a",
  j: (date) => String(getDayOfYear(date)).padStart(3, "0"),
  "%": () => "%",
};

/**
 * 以 strftime 風格的樣式格式化日期，例如 `%Y-%m_%B` → `2024-03_March`。
 * 不支援的指令原樣輸出。
 */
export function strftime(date: Date, pattern: string): string {
  let out = "";
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch !== "%" || i === pattern.length - 1) {
      out += ch;
      continue;
    }
    const key = pattern[i + 1];
    const directive = Object.hasOwn(directives, key)
      ? directives[key]
      : undefined;
    if (directive === undefined) {
      out += ch;
      continue;
    }
    out +=
      typeof directive === "string" ? format(date, directive) : directive(date);
    i++;
  }
  return out;
}
