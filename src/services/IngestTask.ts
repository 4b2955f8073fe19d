import path from "node:path";

import type { IngestConfig } from "@/config/IngestConfig";
import { captureFolderName } from "@/constants";

import type {
  IngestEvent,
  IngestResult,
  IngestService,
  OnIngestEvent,
} from "./IngestService";

export type IngestLogLevel = "info" | "warn" | "error";

export type IngestCallbacks = {
  /** 每個事件一行文字；單檔失敗為 warn，中止為 error */
  onLog?: (line: string, level: IngestLogLevel) => void;
  /** 每處理完一個檔案回報 0–100 的進度 */
  onProgress?: (percent: number) => void;
};

/**
 * 將事件轉成給使用者看的單行文字；不需要顯示的事件回傳 undefined。
 */
export function formatIngestEvent(event: IngestEvent): string | undefined {
  switch (event.type) {
    case "ingest.start":
      return [
        `來源: ${event.sourcePath}`,
        `目的: ${event.destinationRoot} (磁碟區: ${event.volumeLabel})`,
      ].join("\n");
    case "ingest.scan":
      return `找到 ${event.total} 個待處理檔案`;
    case "ingest.session":
      return `建立工作階段: ${event.sessionPath}`;
    case "ingest.file.moved":
      return `✓ 已搬移: ${path.basename(event.from)} -> ${event.sessionName}/${captureFolderName}`;
    case "ingest.file.failed":
    case "ingest.aborted":
      return event.message;
    case "ingest.done":
      return `匯入完成：成功 ${event.successCount} 個，失敗 ${event.failCount} 個`;
    case "ingest.progress":
      return undefined;
  }
}

export function ingestEventLevel(event: IngestEvent): IngestLogLevel {
  switch (event.type) {
    case "ingest.aborted":
      return "error";
    case "ingest.file.failed":
      return "warn";
    default:
      return "info";
  }
}

/**
 * 一次匯入的執行控制代碼：建立後立即在背景開始執行，
 * 可訂閱事件、以 for await 逐一讀取事件，或等待最終結果。不支援中途取消。
 */
export class IngestTask {
  readonly result: Promise<IngestResult>;

  private readonly history: IngestEvent[] = [];
  private readonly listeners = new Set<OnIngestEvent>();
  private waiters: Array<() => void> = [];
  private finished = false;

  constructor(service: IngestService, config: IngestConfig) {
    // 延到下一個 microtask 才開始，讓呼叫端先掛上 listener
    this.result = Promise.resolve().then(() =>
      service.ingest(config, (event) => this.emit(event))
    );
    const finish = () => {
      this.finished = true;
      this.wake();
    };
    void this.result.then(finish, finish);
  }

  /** 訂閱之後的事件，回傳取消訂閱函式 */
  on(listener: OnIngestEvent): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  attachCallbacks(callbacks: IngestCallbacks): () => void {
    return this.on((event) => {
      if (event.type === "ingest.progress") {
        callbacks.onProgress?.(event.percent);
        return;
      }
      const line = formatIngestEvent(event);
      if (line !== undefined) callbacks.onLog?.(line, ingestEventLevel(event));
    });
  }

  /** 從執行開始依序讀取所有事件，執行結束後迭代結束 */
  async *events(): AsyncGenerator<IngestEvent, void, undefined> {
    let index = 0;
    while (true) {
      if (index < this.history.length) {
        yield this.history[index++];
        continue;
      }
      if (this.finished) return;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  [Symbol.asyncIterator]() {
    return this.events();
  }

  private emit(event: IngestEvent) {
    this.history.push(event);
    for (const listener of this.listeners) {
      listener(event);
    }
    this.wake();
  }

  private wake() {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
