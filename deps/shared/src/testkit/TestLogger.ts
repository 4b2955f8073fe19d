import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";
import { LoggerConsole, logLevels } from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Optional(
      t.Union(logLevels.map((level) => t.Literal(level)))
    ),
  })
);

/** 測試用 logger，預設靜音，可用 TEST_LOG_LEVEL 打開 */
export function buildTestLogger() {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL ?? "silent");
}
