import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { getAppEnv } from "@/config/env";
import type { IngestConfig } from "@/config/IngestConfig";
import { CaptureDateResolverDefault } from "@/services/CaptureDateResolverDefault";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import type { IngestResult } from "@/services/IngestService";
import { IngestServiceDefault } from "@/services/IngestServiceDefault";
import { IngestTask } from "@/services/IngestTask";
import { SessionLocatorDefault } from "@/services/SessionLocatorDefault";
import { confirm } from "@/utils/helper";

import { type ConfigOption, createConfigStore, createVolumeResolver } from "./shared";

type IngestOptions = ConfigOption & {
  volume?: string;
  template?: string;
  extensions?: string;
  save?: boolean;
  report?: boolean;
  exif?: boolean;
  yes?: boolean;
};

function applyOverrides(
  config: IngestConfig,
  source: string | undefined,
  options: IngestOptions
): IngestConfig {
  return {
    ...config,
    ...(source !== undefined && { source_path: source }),
    ...(options.volume !== undefined && {
      destination_volume_label: options.volume,
    }),
    ...(options.template !== undefined && { template_path: options.template }),
    ...(options.extensions !== undefined && {
      file_extensions: options.extensions,
    }),
  };
}

export function registerIngest(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "ingest [source]",
      "依拍攝日期將來源資料夾的相片搬移到目的磁碟區的工作階段資料夾"
    )
    .option("--config <path>", "設定檔路徑，預設為 RAW_INGEST_CONFIG_PATH")
    .option("--volume <label>", "目的磁碟區標籤")
    .option("--template <path>", "工作階段範本資料夾")
    .option("--extensions <list>", "逗號分隔的副檔名，例如 .RAF,.JPG")
    .option("--save", "將本次指定的參數寫回設定檔", { default: false })
    .option("--no-report", "不輸出 JSON 匯入報告")
    .option("--no-exif", "不讀取 EXIF，一律使用檔案修改時間")
    .option("--yes", "略過確認直接執行", { default: false })
    .action(async (source: string | undefined, options: IngestOptions) => {
      const logger = baseLogger.extend("ingest", { emoji: "📥" });
      const store = createConfigStore(logger, options);
      const config = applyOverrides(await store.load(), source, options);

      if (options.save) {
        const saved = await store.save(config);
        if (!saved.ok) {
          logger.error({ error: saved.error })`設定檔寫入失敗`;
          process.exitCode = 1;
          return;
        }
        logger.info({ emoji: "💾" })`設定已寫入 ${store.filePath}`;
      }

      const proceed =
        options.yes ||
        (await confirm(
          `將 ${config.source_path || "(未設定)"} 匯入磁碟區「${config.destination_volume_label}」，是否繼續？ [y/N] `
        ));
      if (!proceed) {
        logger.warn({ emoji: "⏹️" })`使用者取消`;
        return;
      }

      const exifService =
        options.exif === false ? undefined : new ExifServiceExifTool();
      const service = new IngestServiceDefault({
        volumeResolver: createVolumeResolver(logger),
        dateResolver: new CaptureDateResolverDefault({ exifService, logger }),
        sessionLocator: new SessionLocatorDefault({ logger }),
        scanner: new FileSystemScannerDefault(),
        logger,
      });

      let result: IngestResult;
      try {
        const task = new IngestTask(service, config);
        task.attachCallbacks({
          onLog: (line, level) => logger[level](line),
          onProgress: (percent) =>
            logger.debug({ event: "progress" })`進度 ${percent.toFixed(1)}%`,
        });
        result = await task.result;
      } finally {
        await dispose(exifService);
      }

      if (options.report !== false) {
        const reporter = new DumpWriterDefault(
          logger,
          getAppEnv().RAW_INGEST_REPORT_DIR
        );
        await reporter.dump("ingest-report", { config, result });
      }

      if (result.fatal || result.failCount > 0) {
        process.exitCode = 1;
      }
    });
}
