import { type StaticDecode, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message}\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** 環境變數中的布林值："true" / "false" / "1" / "0" */
export function envBoolean() {
  return t
    .Transform(
      t.Union([t.Literal("true"), t.Literal("false"), t.Literal("1"), t.Literal("0")])
    )
    .Decode((value) => value === "true" || value === "1")
    .Encode((value): "true" | "false" => (value ? "true" : "false"));
}

/**
 * 依 schema 從環境變數讀取設定，第一次呼叫後快取結果。
 * 只取 schema 中宣告的 key，空字串視為未設定。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: NodeJS.ProcessEnv = process.env
) {
  let cached: { value: StaticDecode<T> } | undefined;

  return (): StaticDecode<T> => {
    if (cached) return cached.value;

    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }

    const withDefaults = Value.Default(schema, picked);
    if (!Value.Check(schema, withDefaults)) {
      const issues = [...Value.Errors(schema, withDefaults)].map(
        (error) => `${error.path || "/"}: ${error.message}`
      );
      throw new ConfigError("環境變數設定不正確", issues);
    }

    cached = { value: Value.Decode(schema, withDefaults) };
    return cached.value;
  };
}
