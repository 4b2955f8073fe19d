import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";

import { type ConfigOption, createConfigStore, createVolumeResolver } from "./shared";

export function registerVolumes(cli: CAC, baseLogger: Logger) {
  cli
    .command("volumes", "列出目前可用的磁碟區與標籤")
    .option("--config <path>", "設定檔路徑，用來標示目前設定的磁碟區")
    .action(async (options: ConfigOption) => {
      const logger = baseLogger.extend("volumes", { emoji: "💽" });
      const config = await createConfigStore(logger, options).load();
      const volumes = await createVolumeResolver(logger).enumerate();

      if (volumes.length === 0) {
        logger.warn("找不到任何磁碟區");
        return;
      }
      for (const volume of volumes) {
        const selected =
          volume.label === config.destination_volume_label ? " ★" : "";
        logger.info()`${volume.label} → ${volume.mountPath}${selected}`;
      }
    });
}
