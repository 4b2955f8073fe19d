export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;

export type LogLevel = (typeof logLevels)[number];
export type WritableLogLevel = Exclude<LogLevel, "silent">;

/**
 * 附加在每筆紀錄上的結構化資訊。
 * - emoji：覆寫輸出時的 emoji
 * - event：事件名稱，會取代 level 顯示在訊息前綴
 * - error：錯誤物件，Error 會輸出 stack
 */
export type LogContext = {
  emoji?: string;
  event?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，name 會接在路徑後面，context 由子 logger 繼承 */
  extend(name: string, context?: LogContext): Logger;

  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}

export type LogRecordError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: WritableLogLevel;
  path: string[];
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: LogRecordError;
};

export interface LogTransport {
  write(record: LogRecord): void;
  [Symbol.asyncDispose](): Promise<void>;
}
