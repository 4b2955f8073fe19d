import { type Static, Type as t } from "@sinclair/typebox";
import path from "node:path";

export const ingestConfigSchema = t.Object(
  {
    source_path: t.String(),
    destination_volume: t.String(),
    destination_volume_label: t.String(),
    template_path: t.String(),
    year_format: t.String(),
    month_format: t.String(),
    session_format: t.String(),
    file_extensions: t.String(),
  },
  { additionalProperties: true }
);

/**
 * 匯入設定。未知的 key 會原樣保留並寫回設定檔。
 */
export type IngestConfig = Static<typeof ingestConfigSchema> & {
  [key: string]: unknown;
};

export type IngestConfigKey = keyof Static<typeof ingestConfigSchema>;

export function isIngestConfigKey(key: string): key is IngestConfigKey {
  return Object.hasOwn(ingestConfigSchema.properties, key);
}

export const ingestConfigKeys: IngestConfigKey[] = Object.keys(
  ingestConfigSchema.properties
).filter(isIngestConfigKey);

export const defaultIngestConfig: Readonly<Static<typeof ingestConfigSchema>> =
  Object.freeze({
    source_path: "",
    destination_volume: "",
    destination_volume_label: "",
    template_path: "",
    year_format: "%Y",
    month_format: "%Y-%m_%B",
    session_format: "Session_{month_name}",
    file_extensions: ".RAF, .JPG",
  });

export function createDefaultConfig(): IngestConfig {
  return { ...defaultIngestConfig };
}

/**
 * 解析逗號分隔的副檔名清單，統一轉為大寫。
 * 例：".RAF, .jpg" → [".RAF", ".JPG"]
 */
export function parseExtensionList(value: string): string[] {
  return value
    .split(",")
    .map((ext) => ext.trim().toUpperCase())
    .filter((ext) => ext.length > 0);
}

export function shouldProcessFile(
  filePath: string,
  extensions: readonly string[]
): boolean {
  const ext = path.extname(filePath).toUpperCase();
  if (ext === "") return false;
  return extensions.includes(ext);
}
