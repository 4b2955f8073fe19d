import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { ingestConfigKeys, isIngestConfigKey } from "@/config/IngestConfig";

import { type ConfigOption, createConfigStore } from "./shared";

export function registerConfig(cli: CAC, baseLogger: Logger) {
  cli
    .command("config [key] [value]", "顯示或修改設定；只給 key 時顯示該值")
    .option("--config <path>", "設定檔路徑，預設為 RAW_INGEST_CONFIG_PATH")
    .action(
      async (
        key: string | undefined,
        value: string | undefined,
        options: ConfigOption
      ) => {
        const logger = baseLogger.extend("config", { emoji: "⚙️" });
        const store = createConfigStore(logger, options);
        const config = await store.load();

        if (key === undefined) {
          console.log(JSON.stringify(config, null, 4));
          return;
        }
        if (!isIngestConfigKey(key)) {
          logger.error({
            key,
          })`未知的設定 ${key}，可用的設定：${ingestConfigKeys.join(", ")}`;
          process.exitCode = 1;
          return;
        }
        if (value === undefined) {
          console.log(config[key]);
          return;
        }

        const saved = await store.save({ ...config, [key]: value });
        if (!saved.ok) {
          logger.error({ error: saved.error })`設定檔寫入失敗`;
          process.exitCode = 1;
          return;
        }
        logger.info({ event: "saved" })`${key} = ${value}`;
      }
    );
}
