import { Value } from "@sinclair/typebox/value";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import {
  type IngestConfig,
  createDefaultConfig,
  defaultIngestConfig,
  ingestConfigKeys,
  ingestConfigSchema,
} from "@/config/IngestConfig";
import { errorMessage, isErrnoException, isRecord } from "@/utils/helper";

import type { ConfigStore, WriteError } from "./ConfigStore";

export class ConfigStoreJson implements ConfigStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(deps: { filePath: string; logger: Logger }) {
    this.filePath = deps.filePath;
    this.logger = deps.logger.extend("ConfigStoreJson", {
      filePath: deps.filePath,
    });
  }

  async load(): Promise<IngestConfig> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        this.logger.debug()`設定檔不存在，使用預設設定`;
      } else {
        this.logger.warn({ error })`讀取設定檔失敗，使用預設設定`;
      }
      return createDefaultConfig();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.logger.warn({ error })`設定檔不是合法的 JSON，使用預設設定`;
      return createDefaultConfig();
    }

    if (!isRecord(raw)) {
      this.logger.warn()`設定檔內容不是物件，使用預設設定`;
      return createDefaultConfig();
    }

    // 保留未知的 key；缺少或型別不是字串的已知 key 由預設值補上
    const merged = { ...defaultIngestConfig, ...raw };
    if (!Value.Check(ingestConfigSchema, merged)) {
      const issues = [...Value.Errors(ingestConfigSchema, merged)].map(
        (e) => `${e.path}: ${e.message}`
      );
      this.logger.warn({ issues })`設定檔部分欄位型別不正確，改用預設值`;
    }
    const config: IngestConfig = { ...raw, ...createDefaultConfig() };
    for (const key of ingestConfigKeys) {
      const value = raw[key];
      if (typeof value === "string") config[key] = value;
    }
    return config;
  }

  async save(config: IngestConfig): Promise<Result<null, WriteError>> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(
        this.filePath,
        `${JSON.stringify(config, null, 4)}\n`,
        "utf8"
      );
      this.logger.debug({ event: "saved" })`設定已儲存`;
      return ok(null);
    } catch (error) {
      this.logger.error({ error })`寫入設定檔失敗`;
      return err({ type: "WRITE_FAILED", message: errorMessage(error) });
    }
  }
}
