import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { logLevels } from "./Logger";
import { LoggerConsole, defaultEmojiMap } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";
export * from "./RfsTransport";

const getLoggerEnv = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(t.Union(logLevels.map((level) => t.Literal(level)))),
    LOG_FILE_DIR: t.Optional(t.String()),
    LOG_FILE_NAME: t.String({ default: "raw-ingest.log" }),
  })
);

/**
 * 依環境變數建立根 logger：
 * - LOG_LEVEL 預設 info
 * - 設定 LOG_FILE_DIR 時額外輸出輪替的 JSON log 檔
 */
export function createDefaultLoggerFromEnv(): LoggerConsole {
  const { LOG_LEVEL, LOG_FILE_DIR, LOG_FILE_NAME } = getLoggerEnv();
  const logger = new LoggerConsole(LOG_LEVEL ?? "info", [], {}, defaultEmojiMap);
  if (LOG_FILE_DIR) {
    logger.attachTransport(
      new RfsTransport({ filename: LOG_FILE_NAME, rfs: { path: LOG_FILE_DIR } })
    );
  }
  return logger;
}
