import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { type IngestConfig, parseExtensionList } from "@/config/IngestConfig";
import { errorMessage, expandHome, isDirectory, moveFile } from "@/utils/helper";

import type { CaptureDateResolver, CaptureDateSource } from "./CaptureDateResolver";
import type { FileSystemScanner } from "./FileSystemScanner";
import { findAvailablePath } from "./findAvailablePath";
import type {
  FileMove,
  IngestEvent,
  IngestResult,
  IngestService,
  OnIngestEvent,
} from "./IngestService";
import { buildSessionSegments } from "./SessionPathBuilder";
import type { SessionLocator } from "./SessionLocator";
import type { VolumeResolver } from "./VolumeResolver";

type MovedFile = FileMove & {
  sessionName: string;
  dateSource: CaptureDateSource;
};

export const invalidSourceMessage = "來源路徑無效或不存在";

export function formatFailure(filePath: string, message: string) {
  return `✗ 失敗: ${path.basename(filePath)} - ${message}`;
}

export class IngestServiceDefault implements IngestService {
  private readonly volumeResolver: VolumeResolver;
  private readonly dateResolver: CaptureDateResolver;
  private readonly sessionLocator: SessionLocator;
  private readonly scanner: FileSystemScanner;
  private readonly logger: Logger;

  constructor(deps: {
    volumeResolver: VolumeResolver;
    dateResolver: CaptureDateResolver;
    sessionLocator: SessionLocator;
    scanner: FileSystemScanner;
    logger: Logger;
  }) {
    this.volumeResolver = deps.volumeResolver;
    this.dateResolver = deps.dateResolver;
    this.sessionLocator = deps.sessionLocator;
    this.scanner = deps.scanner;
    this.logger = deps.logger.extend("IngestService");
  }

  /**
   * 自身只輸出 debug 紀錄；給使用者看的訊息由 onEvent 的呼叫端決定。
   */
  async ingest(
    config: IngestConfig,
    onEvent?: OnIngestEvent
  ): Promise<IngestResult> {
    const startMs = Date.now();
    const logger = this.logger.extend("ingest");
    const emit = (event: IngestEvent) => {
      if (!onEvent) return;
      try {
        onEvent(event);
      } catch (error) {
        logger.warn({ error, eventType: event.type })`事件處理器拋出例外`;
      }
    };
    const result: IngestResult = {
      successCount: 0,
      failCount: 0,
      total: 0,
      errors: [],
      moves: [],
      fatal: false,
    };
    const abort = (message: string): IngestResult => {
      logger.debug({ emoji: "⛔", event: "aborted" }, message);
      emit({ type: "ingest.aborted", message });
      return { ...result, errors: [message], fatal: true };
    };

    // 1) 前置檢查：來源資料夾與目的磁碟區
    const sourcePath = config.source_path ? expandHome(config.source_path) : "";
    if (!sourcePath || !(await isDirectory(sourcePath))) {
      return abort(invalidSourceMessage);
    }
    const volumeLabel = config.destination_volume_label;
    const volume = await this.volumeResolver.resolve(volumeLabel);
    if (isErr(volume)) {
      return abort(volume.error.message);
    }
    const destinationRoot = volume.value;

    logger.debug({
      emoji: "📥",
      event: "start",
    })`來源: ${sourcePath} → 目的: ${destinationRoot} (磁碟區: ${volumeLabel})`;
    emit({ type: "ingest.start", sourcePath, destinationRoot, volumeLabel });

    // 2) 掃描符合副檔名的檔案
    const extensions = parseExtensionList(config.file_extensions);
    let candidates: string[] = [];
    if (extensions.length === 0) {
      logger.warn()`未設定任何副檔名，沒有檔案會被匯入`;
    } else {
      const scan = await this.scanner.scan(sourcePath, extensions);
      if (isErr(scan)) {
        return abort(`掃描來源資料夾失敗: ${scan.error.message}`);
      }
      candidates = scan.value;
    }
    result.total = candidates.length;
    logger.debug({ emoji: "🔎", count: result.total })`找到 ${result.total} 個檔案`;
    emit({ type: "ingest.scan", total: result.total });

    // 3) 逐一搬移；單一檔案失敗不影響其他檔案
    const templatePath = config.template_path
      ? expandHome(config.template_path)
      : "";
    for (const [index, filePath] of candidates.entries()) {
      let outcome: Result<MovedFile, string>;
      try {
        outcome = await this.ingestOne(
          filePath,
          destinationRoot,
          templatePath,
          config,
          emit
        );
      } catch (error) {
        outcome = err(errorMessage(error));
      }

      if (outcome.ok) {
        const { from, to, sessionName, dateSource } = outcome.value;
        result.successCount++;
        result.moves.push({ from, to });
        logger.debug({
          emoji: "✓",
          dateSource,
        })`已搬移 ${path.basename(from)} → ${path.relative(destinationRoot, to)}`;
        emit({ type: "ingest.file.moved", from, to, sessionName, dateSource });
      } else {
        const message = formatFailure(filePath, outcome.error);
        result.failCount++;
        result.errors.push(message);
        logger.debug({ filePath }, message);
        emit({ type: "ingest.file.failed", filePath, message });
      }

      const completed = index + 1;
      emit({
        type: "ingest.progress",
        completed,
        total: result.total,
        percent: (completed / result.total) * 100,
      });
    }

    const elapsedMs = Date.now() - startMs;
    logger.debug({
      event: "done",
      successCount: result.successCount,
      failCount: result.failCount,
      elapsedMs,
    })`匯入完成：成功 ${result.successCount}，失敗 ${result.failCount}`;
    emit({
      type: "ingest.done",
      successCount: result.successCount,
      failCount: result.failCount,
      elapsedMs,
    });
    return result;
  }

  private async ingestOne(
    filePath: string,
    destinationRoot: string,
    templatePath: string,
    config: IngestConfig,
    emit: OnIngestEvent
  ): Promise<Result<MovedFile, string>> {
    const date = await this.dateResolver.resolve(filePath);
    if (isErr(date)) return err(date.error.message);

    const segments = buildSessionSegments(date.value.time, config);
    const session = await this.sessionLocator.locateOrCreate({
      destinationRoot,
      segments,
      templatePath,
    });
    if (isErr(session)) return err(session.error.message);
    if (session.value.origin !== "existing") {
      emit({
        type: "ingest.session",
        sessionPath: session.value.sessionPath,
        origin: session.value.origin,
      });
    }

    const target = await findAvailablePath(
      session.value.capturePath,
      path.basename(filePath)
    );
    if (isErr(target)) return err(target.error.message);

    await moveFile(filePath, target.value);
    return ok({
      from: filePath,
      to: target.value,
      sessionName: segments.sessionName,
      dateSource: date.value.source,
    });
  }
}
